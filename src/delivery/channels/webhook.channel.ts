import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { CircuitBreakerFactory } from '../../common/circuit-breaker.factory';
import {
  canonicalJson,
  DeliveryPayload,
  signPayload,
} from '../delivery-payload';
import { ChannelHttpError } from '../delivery.error';
import type {
  ChannelResult,
  DeliveryChannel,
  DeliveryTarget,
} from '../interfaces/delivery-channel.interface';
import { channelFailure } from './channel-result';

interface WebhookRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * POSTs the signed payload to the buyer's endpoint. Each receiving host gets
 * its own breaker so one failing buyer does not trip delivery to the rest.
 */
@Injectable()
export class WebhookChannel implements DeliveryChannel {
  readonly name = 'webhook' as const;
  private readonly logger = new Logger(WebhookChannel.name);
  private readonly breakers = new Map<
    string,
    CircuitBreaker<[WebhookRequest], number>
  >();
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(
    private readonly breakerFactory: CircuitBreakerFactory,
    configService: ConfigService,
  ) {
    this.timeoutMs = configService.get<number>('WEBHOOK_TIMEOUT_MS', 10000);
    this.userAgent = configService.get<string>(
      'WEBHOOK_USER_AGENT',
      'lead-exchange-delivery/1.0',
    );
  }

  accepts(target: DeliveryTarget): boolean {
    return Boolean(target.webhookUrl);
  }

  async send(
    target: DeliveryTarget,
    payload: DeliveryPayload,
    deliveryId: string,
  ): Promise<ChannelResult> {
    if (!target.webhookUrl) {
      return channelFailure(new Error('No webhook URL for buyer'));
    }

    let host: string;
    try {
      host = new URL(target.webhookUrl).host;
    } catch {
      return channelFailure(new Error(`Invalid webhook URL for buyer ${target.buyerId}`));
    }

    const body = canonicalJson(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': this.userAgent,
      'X-Delivery-Id': deliveryId,
    };
    if (target.webhookSecret) {
      headers['X-Webhook-Signature'] = `sha256=${signPayload(body, target.webhookSecret)}`;
    }

    try {
      const status = await this.breakerFor(host).fire({
        url: target.webhookUrl,
        headers,
        body,
      });
      return { success: true, httpStatus: status, errorMessage: null };
    } catch (error) {
      const result = channelFailure(error);
      this.logger.warn(
        `Webhook to ${host} failed for lead ${payload.lead_id}: ${result.errorMessage ?? 'unknown'}`,
      );
      return result;
    }
  }

  private breakerFor(host: string): CircuitBreaker<[WebhookRequest], number> {
    let breaker = this.breakers.get(host);
    if (!breaker) {
      breaker = this.breakerFactory.create(
        `webhook:${host}`,
        (request: WebhookRequest) => this.post(request),
        // backstop only; fetch aborts at timeoutMs
        { timeoutMs: this.timeoutMs + 1000 },
      );
      this.breakers.set(host, breaker);
    }
    return breaker;
  }

  private async post(request: WebhookRequest): Promise<number> {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status < 200 || response.status >= 300) {
      throw new ChannelHttpError(response.status, await response.text());
    }
    return response.status;
  }
}
