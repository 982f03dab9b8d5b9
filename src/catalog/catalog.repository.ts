import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Raw, Repository } from 'typeorm';
import {
  Buyer,
  BuyerOffer,
  BuyerServiceArea,
  Offer,
  OfferExclusivity,
  RoutingPolicy,
  ScopeType,
  Source,
  ValidationPolicy,
} from './entities';
import {
  Attribution,
  CatalogStore,
  HttpSourceMapping,
  LocationScope,
  PolicyRecord,
} from './interfaces/catalog-store.interface';

/** Case-insensitive equality on a varchar column */
const equalsIgnoringCase = (value: string) =>
  Raw((column) => `LOWER(${column}) = LOWER(:value)`, { value });

@Injectable()
export class CatalogRepository implements CatalogStore {
  constructor(
    @InjectRepository(Source)
    private readonly sources: Repository<Source>,
    @InjectRepository(Offer)
    private readonly offers: Repository<Offer>,
    @InjectRepository(ValidationPolicy)
    private readonly validationPolicies: Repository<ValidationPolicy>,
    @InjectRepository(RoutingPolicy)
    private readonly routingPolicies: Repository<RoutingPolicy>,
    @InjectRepository(OfferExclusivity)
    private readonly exclusivities: Repository<OfferExclusivity>,
    @InjectRepository(BuyerOffer)
    private readonly enrollments: Repository<BuyerOffer>,
    @InjectRepository(BuyerServiceArea)
    private readonly serviceAreas: Repository<BuyerServiceArea>,
    @InjectRepository(Buyer)
    private readonly buyers: Repository<Buyer>,
  ) {}

  async findActiveSourceById(sourceId: number): Promise<Attribution | null> {
    const source = await this.sources.findOne({
      where: { id: sourceId, isActive: true },
      relations: { offer: true },
    });
    return source ? toAttribution(source) : null;
  }

  async findActiveSourceByKey(sourceKey: string): Promise<Attribution | null> {
    const source = await this.sources.findOne({
      where: { sourceKey, isActive: true },
      relations: { offer: true },
    });
    return source ? toAttribution(source) : null;
  }

  async findActiveSourcesByHostname(
    hostname: string,
  ): Promise<HttpSourceMapping[]> {
    const sources = await this.sources.find({
      where: { hostname: equalsIgnoringCase(hostname), isActive: true },
      relations: { offer: true },
      order: { id: 'ASC' },
    });
    return sources.map((source) => ({
      ...toAttribution(source),
      pathPrefix: source.pathPrefix,
    }));
  }

  findOffer(offerId: number): Promise<Offer | null> {
    return this.offers.findOne({ where: { id: offerId } });
  }

  async findActiveValidationPolicy(
    offerId: number,
  ): Promise<PolicyRecord | null> {
    const offer = await this.findOffer(offerId);
    if (!offer) {
      return null;
    }
    const policy = await this.validationPolicies.findOne({
      where: { id: offer.validationPolicyId, isActive: true },
    });
    return policy
      ? { id: policy.id, version: policy.version, document: policy.rules }
      : null;
  }

  async findActiveRoutingPolicy(offerId: number): Promise<PolicyRecord | null> {
    const offer = await this.findOffer(offerId);
    if (!offer) {
      return null;
    }
    const policy = await this.routingPolicies.findOne({
      where: { id: offer.routingPolicyId, isActive: true },
    });
    return policy
      ? { id: policy.id, version: policy.version, document: policy.config }
      : null;
  }

  findActiveExclusivity(
    offerId: number,
    scopeType: ScopeType,
    scopeValue: string,
  ): Promise<OfferExclusivity | null> {
    return this.exclusivities.findOne({
      where: {
        offerId,
        scopeType,
        scopeValue:
          scopeType === 'city' ? equalsIgnoringCase(scopeValue) : scopeValue,
        isActive: true,
      },
    });
  }

  findEnrollments(offerId: number): Promise<BuyerOffer[]> {
    return this.enrollments.find({
      where: { offerId },
      relations: { buyer: true },
      order: { buyerId: 'ASC' },
    });
  }

  findEnrollment(buyerId: number, offerId: number): Promise<BuyerOffer | null> {
    return this.enrollments.findOne({
      where: { buyerId, offerId },
      relations: { buyer: true },
    });
  }

  findBuyer(buyerId: number): Promise<Buyer | null> {
    return this.buyers.findOne({ where: { id: buyerId } });
  }

  async findCoveringBuyerIds(
    marketId: number,
    location: LocationScope,
  ): Promise<number[]> {
    const where: FindOptionsWhere<BuyerServiceArea>[] = [];
    if (location.postalCode) {
      where.push({
        marketId,
        isActive: true,
        scopeType: 'postal_code',
        scopeValue: location.postalCode,
      });
    }
    if (location.city) {
      where.push({
        marketId,
        isActive: true,
        scopeType: 'city',
        scopeValue: equalsIgnoringCase(location.city),
      });
    }
    if (where.length === 0) {
      return [];
    }

    const areas = await this.serviceAreas.find({ where });
    return [...new Set(areas.map((area) => area.buyerId))].sort(
      (a, b) => a - b,
    );
  }
}

function toAttribution(source: Source): Attribution {
  return {
    sourceId: source.id,
    offerId: source.offerId,
    marketId: source.offer.marketId,
    verticalId: source.offer.verticalId,
  };
}
