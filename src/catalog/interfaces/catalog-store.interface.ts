import type {
  Buyer,
  BuyerOffer,
  Offer,
  OfferExclusivity,
  ScopeType,
} from '../entities';

/** (source, offer, market, vertical) a lead is classified into */
export interface Attribution {
  sourceId: number;
  offerId: number;
  marketId: number;
  verticalId: number;
}

export interface HttpSourceMapping extends Attribution {
  pathPrefix: string | null;
}

export interface PolicyRecord {
  id: number;
  version: number;
  document: Record<string, unknown>;
}

export interface LocationScope {
  postalCode: string | null;
  city: string | null;
}

/**
 * Read-only access to the reference graph. Every lookup that says "active"
 * filters on `is_active`; enrollments are returned with their buyer loaded.
 */
export interface CatalogStore {
  findActiveSourceById(sourceId: number): Promise<Attribution | null>;
  findActiveSourceByKey(sourceKey: string): Promise<Attribution | null>;
  findActiveSourcesByHostname(hostname: string): Promise<HttpSourceMapping[]>;

  findOffer(offerId: number): Promise<Offer | null>;
  findActiveValidationPolicy(offerId: number): Promise<PolicyRecord | null>;
  findActiveRoutingPolicy(offerId: number): Promise<PolicyRecord | null>;

  findActiveExclusivity(
    offerId: number,
    scopeType: ScopeType,
    scopeValue: string,
  ): Promise<OfferExclusivity | null>;
  findEnrollments(offerId: number): Promise<BuyerOffer[]>;
  findEnrollment(buyerId: number, offerId: number): Promise<BuyerOffer | null>;
  findBuyer(buyerId: number): Promise<Buyer | null>;
  findCoveringBuyerIds(
    marketId: number,
    location: LocationScope,
  ): Promise<number[]>;
}

export const CATALOG_STORE = 'CATALOG_STORE';
