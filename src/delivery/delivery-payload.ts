import { createHmac } from 'crypto';
import type { Lead } from '../leads/lead.entity';

export interface DeliveryPayload {
  lead_id: number;
  idempotency_key: string;
  source: string;
  contact: {
    name: string | null;
    email: string | null;
    phone: string | null;
  };
  location: {
    country_code: string;
    postal_code: string | null;
    city?: string;
    region_code?: string;
  };
  message?: string;
  attribution?: {
    utm_source: string;
    utm_medium?: string;
    utm_campaign?: string;
  };
  timestamp: string;
}

/**
 * Buyer-facing view of a lead. The idempotency key is scoped to delivery so a
 * receiver can dedupe retries of the same lead.
 */
export function buildDeliveryPayload(
  lead: Lead,
  now = new Date(),
): DeliveryPayload {
  const payload: DeliveryPayload = {
    lead_id: lead.id,
    idempotency_key: `delivery:${lead.id}:${lead.idempotencyKey}`,
    source: lead.source,
    contact: {
      name: lead.name,
      email: lead.email,
      phone: lead.phone,
    },
    location: {
      country_code: lead.countryCode,
      postal_code: lead.postalCode,
    },
    timestamp: now.toISOString(),
  };

  if (lead.city) payload.location.city = lead.city;
  if (lead.regionCode) payload.location.region_code = lead.regionCode;
  if (lead.message) payload.message = lead.message;
  if (lead.utmSource) {
    payload.attribution = { utm_source: lead.utmSource };
    if (lead.utmMedium) payload.attribution.utm_medium = lead.utmMedium;
    if (lead.utmCampaign) payload.attribution.utm_campaign = lead.utmCampaign;
  }

  return payload;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, sortKeys(entry)]),
    );
  }
  return value;
}

/** JSON with object keys sorted at every depth; this is the signed body */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function signPayload(body: string, secret: string): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest('hex');
}
