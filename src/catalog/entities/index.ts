export { Market } from './market.entity';
export { Vertical } from './vertical.entity';
export { Offer } from './offer.entity';
export { Source } from './source.entity';
export type { SourceKind } from './source.entity';
export { Buyer } from './buyer.entity';
export { BuyerOffer } from './buyer-offer.entity';
export { BuyerServiceArea, OfferExclusivity } from './territory.entity';
export type { ScopeType } from './territory.entity';
export { ValidationPolicy, RoutingPolicy } from './policy-document.entity';
