import type { DeliveryChannelName } from '../../leads/lead.entity';
import type { DeliveryPayload } from '../delivery-payload';

/** Where one buyer receives leads for one offer, overrides applied */
export interface DeliveryTarget {
  buyerId: number;
  webhookUrl: string | null;
  webhookSecret: string | null;
  email: string | null;
  phone: string | null;
}

export interface ChannelResult {
  success: boolean;
  httpStatus: number | null;
  errorMessage: string | null;
}

export interface DeliveryChannel {
  readonly name: DeliveryChannelName;

  /** Whether the target has an address for this channel */
  accepts(target: DeliveryTarget): boolean;

  /** Never throws; failures come back as an unsuccessful result */
  send(
    target: DeliveryTarget,
    payload: DeliveryPayload,
    deliveryId: string,
  ): Promise<ChannelResult>;
}

/** Ordered fallback chain, tried first to last */
export const DELIVERY_CHANNELS = 'DELIVERY_CHANNELS';
