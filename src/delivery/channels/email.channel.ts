import { Inject, Injectable } from '@nestjs/common';
import type { DeliveryPayload } from '../delivery-payload';
import type {
  ChannelResult,
  DeliveryChannel,
  DeliveryTarget,
} from '../interfaces/delivery-channel.interface';
import {
  EMAIL_GATEWAY,
  NotificationGateway,
} from '../interfaces/notification-gateway.interface';
import { CHANNEL_OK, channelFailure } from './channel-result';

@Injectable()
export class EmailChannel implements DeliveryChannel {
  readonly name = 'email' as const;

  constructor(
    @Inject(EMAIL_GATEWAY)
    private readonly gateway: NotificationGateway,
  ) {}

  accepts(target: DeliveryTarget): boolean {
    return Boolean(target.email);
  }

  async send(
    target: DeliveryTarget,
    payload: DeliveryPayload,
  ): Promise<ChannelResult> {
    if (!target.email) {
      return channelFailure(new Error('No email address for buyer'));
    }
    try {
      await this.gateway.send({
        leadId: payload.lead_id,
        to: target.email,
        subject: `New lead #${payload.lead_id}`,
        body: renderEmail(payload),
      });
      return CHANNEL_OK;
    } catch (error) {
      return channelFailure(error);
    }
  }
}

function renderEmail(payload: DeliveryPayload): string {
  const { contact, location } = payload;
  const lines = [
    `Lead #${payload.lead_id} (${payload.source})`,
    '',
    `Name: ${contact.name ?? '-'}`,
    `Email: ${contact.email ?? '-'}`,
    `Phone: ${contact.phone ?? '-'}`,
    `Location: ${[location.city, location.region_code, location.postal_code, location.country_code]
      .filter(Boolean)
      .join(', ')}`,
  ];
  if (payload.message) {
    lines.push('', payload.message);
  }
  lines.push('', `Reference: ${payload.idempotency_key}`);
  return lines.join('\n');
}
