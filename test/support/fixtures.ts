import {
  Buyer,
  BuyerOffer,
  BuyerServiceArea,
  Offer,
  OfferExclusivity,
  RoutingPolicy,
  Source,
  ValidationPolicy,
} from '../../src/catalog/entities';
import { Lead } from '../../src/leads/lead.entity';
import type { LeadDraft } from '../../src/leads/interfaces/lead-store.interface';

const EPOCH = new Date('2026-01-01T00:00:00.000Z');

export function buildOffer(overrides: Partial<Offer> = {}): Offer {
  return Object.assign(new Offer(), {
    id: 10,
    marketId: 100,
    verticalId: 200,
    name: 'Plumbing - Austin',
    isActive: true,
    defaultPricePerLead: 25,
    validationPolicyId: 1,
    routingPolicyId: 1,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildSource(overrides: Partial<Source> = {}): Source {
  return Object.assign(new Source(), {
    id: 1,
    offerId: 10,
    sourceKey: 'lp.austin.plumbing',
    kind: 'landing_page',
    name: 'Austin plumbing landing page',
    hostname: null,
    pathPrefix: null,
    isActive: true,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildBuyer(overrides: Partial<Buyer> = {}): Buyer {
  return Object.assign(new Buyer(), {
    id: 1,
    name: 'Acme Plumbing',
    email: 'leads@acme.test',
    phone: '5125550100',
    company: null,
    webhookUrl: null,
    webhookSecret: null,
    emailNotifications: false,
    smsNotifications: false,
    isActive: true,
    balance: 0,
    defaultPricePerLead: null,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildEnrollment(
  overrides: Partial<BuyerOffer> = {},
): BuyerOffer {
  return Object.assign(new BuyerOffer(), {
    id: 1,
    buyerId: 1,
    offerId: 10,
    isActive: true,
    routingPriority: 1,
    capacityPerDay: null,
    capacityPerHour: null,
    pricePerLead: null,
    webhookUrlOverride: null,
    webhookSecretOverride: null,
    emailOverride: null,
    smsOverride: null,
    minBalanceRequired: null,
    pauseUntil: null,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildServiceArea(
  overrides: Partial<BuyerServiceArea> = {},
): BuyerServiceArea {
  return Object.assign(new BuyerServiceArea(), {
    id: 1,
    buyerId: 1,
    marketId: 100,
    scopeType: 'postal_code',
    scopeValue: '78701',
    isActive: true,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildExclusivity(
  overrides: Partial<OfferExclusivity> = {},
): OfferExclusivity {
  return Object.assign(new OfferExclusivity(), {
    id: 1,
    offerId: 10,
    scopeType: 'postal_code',
    scopeValue: '78701',
    buyerId: 1,
    isActive: true,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildValidationPolicy(
  rules: Record<string, unknown>,
  overrides: Partial<ValidationPolicy> = {},
): ValidationPolicy {
  return Object.assign(new ValidationPolicy(), {
    id: 1,
    name: 'default validation',
    version: 1,
    isActive: true,
    rules,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildRoutingPolicy(
  config: Record<string, unknown>,
  overrides: Partial<RoutingPolicy> = {},
): RoutingPolicy {
  return Object.assign(new RoutingPolicy(), {
    id: 1,
    name: 'default routing',
    version: 1,
    isActive: true,
    config,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}

export function buildDraft(overrides: Partial<LeadDraft> = {}): LeadDraft {
  return {
    sourceId: 1,
    offerId: 10,
    marketId: 100,
    verticalId: 200,
    idempotencyKey: 'client-key-0000000001',
    source: 'landing_page',
    name: 'Pat Example',
    email: 'pat@example.com',
    phone: '5125550123',
    countryCode: 'US',
    postalCode: '78701',
    city: 'Austin',
    regionCode: 'US-TX',
    message: null,
    utmSource: null,
    utmMedium: null,
    utmCampaign: null,
    ipAddress: null,
    userAgent: null,
    ...overrides,
  };
}

export function buildLead(overrides: Partial<Lead> = {}): Lead {
  return Object.assign(new Lead(), {
    ...buildDraft(),
    id: 1,
    normalizedEmail: null,
    normalizedPhone: null,
    status: 'received',
    validationReason: null,
    validationResult: null,
    isDuplicate: false,
    duplicateOfLeadId: null,
    buyerId: null,
    routedAt: null,
    deliveryAttempts: 0,
    deliveryResult: null,
    deliveredAt: null,
    billingStatus: 'pending',
    price: null,
    billedAt: null,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  });
}
