import { Inject, Injectable } from '@nestjs/common';
import type { DeliveryPayload } from '../delivery-payload';
import type {
  ChannelResult,
  DeliveryChannel,
  DeliveryTarget,
} from '../interfaces/delivery-channel.interface';
import {
  NotificationGateway,
  SMS_GATEWAY,
} from '../interfaces/notification-gateway.interface';
import { CHANNEL_OK, channelFailure } from './channel-result';

const SMS_MAX_LENGTH = 160;

@Injectable()
export class SmsChannel implements DeliveryChannel {
  readonly name = 'sms' as const;

  constructor(
    @Inject(SMS_GATEWAY)
    private readonly gateway: NotificationGateway,
  ) {}

  accepts(target: DeliveryTarget): boolean {
    return Boolean(target.phone);
  }

  async send(
    target: DeliveryTarget,
    payload: DeliveryPayload,
  ): Promise<ChannelResult> {
    if (!target.phone) {
      return channelFailure(new Error('No SMS number for buyer'));
    }
    const { contact, location } = payload;
    const text = [
      `New lead #${payload.lead_id}`,
      contact.name,
      contact.phone,
      location.postal_code,
    ]
      .filter(Boolean)
      .join(' | ')
      .slice(0, SMS_MAX_LENGTH);

    try {
      await this.gateway.send({
        leadId: payload.lead_id,
        to: target.phone,
        subject: `New lead #${payload.lead_id}`,
        body: text,
      });
      return CHANNEL_OK;
    } catch (error) {
      return channelFailure(error);
    }
  }
}
