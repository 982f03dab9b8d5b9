import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { BillingService } from '../billing/billing.service';
import {
  CATALOG_STORE,
  CatalogStore,
} from '../catalog/interfaces/catalog-store.interface';
import {
  DELIVERY_ATTEMPTS_TOTAL,
  DELIVERY_DURATION,
} from '../common/metrics.providers';
import { LeadNotFoundError } from '../common/pipeline.error';
import {
  LEAD_STORE,
  LeadStore,
} from '../leads/interfaces/lead-store.interface';
import type {
  DeliveryAttemptRecord,
  Lead,
  LeadStatus,
} from '../leads/lead.entity';
import { buildDeliveryPayload } from './delivery-payload';
import { DeliveryError } from './delivery.error';
import {
  DELIVERY_CHANNELS,
  DeliveryChannel,
  DeliveryTarget,
} from './interfaces/delivery-channel.interface';

export interface DeliveryOutcome {
  leadId: number;
  success: boolean;
  /** false when another attempt cannot change the result */
  retryable: boolean;
  status: LeadStatus;
  attempts: DeliveryAttemptRecord[];
  error: string | null;
}

@Injectable()
export class DeliveryEngine {
  private readonly logger = new Logger(DeliveryEngine.name);

  constructor(
    @Inject(LEAD_STORE)
    private readonly leads: LeadStore,
    @Inject(CATALOG_STORE)
    private readonly catalog: CatalogStore,
    @Inject(DELIVERY_CHANNELS)
    private readonly channels: DeliveryChannel[],
    private readonly billingService: BillingService,
    @Optional()
    @InjectMetric(DELIVERY_ATTEMPTS_TOTAL)
    private readonly attemptsCounter?: Counter<string>,
    @Optional()
    @InjectMetric(DELIVERY_DURATION)
    private readonly deliveryDuration?: Histogram<string>,
  ) {}

  /**
   * One delivery attempt: walks the channel chain until one succeeds, records
   * every try on the lead, and on success marks it delivered and bills it.
   * Retry scheduling belongs to the queue.
   */
  async deliver(leadId: number, attemptNumber: number): Promise<DeliveryOutcome> {
    const lead = await this.leads.findById(leadId);
    if (!lead) {
      throw new LeadNotFoundError(leadId);
    }
    if (lead.status === 'delivered' || lead.status === 'accepted') {
      return this.outcome(lead, true, false, [], null);
    }
    if (lead.status !== 'validated') {
      return this.outcome(lead, false, false, [], `lead_not_deliverable: ${lead.status}`);
    }
    if (lead.buyerId === null) {
      throw new DeliveryError(
        'no_buyer_assigned',
        `Lead ${leadId} has no buyer assigned`,
        leadId,
      );
    }

    const target = await this.resolveTarget(lead, lead.buyerId);
    const channels = this.channels.filter((channel) => channel.accepts(target));
    if (channels.length === 0) {
      this.logger.warn(
        `Lead ${leadId}: buyer ${lead.buyerId} has no delivery channel configured`,
      );
      return this.outcome(lead, false, false, [], 'no_delivery_channel');
    }

    const payload = buildDeliveryPayload(lead);
    const deliveryId = uuidv4();
    const attempts: DeliveryAttemptRecord[] = [];
    const endTimer = this.deliveryDuration?.startTimer();

    for (const channel of channels) {
      const result = await channel.send(target, payload, deliveryId);
      attempts.push({
        attemptNumber,
        channel: channel.name,
        timestamp: new Date().toISOString(),
        httpStatus: result.httpStatus,
        success: result.success,
        errorMessage: result.errorMessage,
      });
      this.attemptsCounter?.inc({
        channel: channel.name,
        status: result.success ? 'success' : 'failure',
      });
      if (result.success) break;
    }
    endTimer?.();

    await this.leads.appendDeliveryAttempts(leadId, attempts);

    const delivered = attempts.find((attempt) => attempt.success);
    if (!delivered) {
      const lastError = attempts[attempts.length - 1]?.errorMessage ?? null;
      this.logger.warn(
        `Lead ${leadId} attempt ${attemptNumber} failed on every channel: ${lastError ?? 'unknown'}`,
      );
      return this.outcome(lead, false, true, attempts, lastError);
    }

    const transition = await this.leads.markDelivered(leadId, lead.buyerId);
    if (transition.outcome === 'conflict') {
      this.logger.warn(
        `Lead ${leadId} delivered via ${delivered.channel} but moved to ${transition.current?.status ?? 'missing'} meanwhile`,
      );
      return {
        leadId,
        success: false,
        retryable: false,
        status: transition.current?.status ?? lead.status,
        attempts,
        error: 'lead_state_changed',
      };
    }

    this.logger.log(
      `Lead ${leadId} delivered to buyer ${lead.buyerId} via ${delivered.channel} (attempt ${attemptNumber})`,
    );
    await this.billingService.billLead(leadId);
    return { leadId, success: true, retryable: false, status: 'delivered', attempts, error: null };
  }

  private async resolveTarget(lead: Lead, buyerId: number): Promise<DeliveryTarget> {
    const enrollment = await this.catalog.findEnrollment(buyerId, lead.offerId);
    const buyer = enrollment?.buyer ?? (await this.catalog.findBuyer(buyerId));
    if (!buyer) {
      throw new DeliveryError(
        'buyer_not_found',
        `Buyer ${buyerId} for lead ${lead.id} not found`,
        lead.id,
      );
    }

    return {
      buyerId,
      webhookUrl: enrollment?.webhookUrlOverride || buyer.webhookUrl || null,
      webhookSecret:
        enrollment?.webhookSecretOverride || buyer.webhookSecret || null,
      email: buyer.emailNotifications
        ? enrollment?.emailOverride || buyer.email || null
        : null,
      phone: buyer.smsNotifications
        ? enrollment?.smsOverride || buyer.phone || null
        : null,
    };
  }

  private outcome(
    lead: Lead,
    success: boolean,
    retryable: boolean,
    attempts: DeliveryAttemptRecord[],
    error: string | null,
  ): DeliveryOutcome {
    return {
      leadId: lead.id,
      success,
      retryable,
      status: lead.status,
      attempts,
      error,
    };
  }
}
