import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import type { BuyerOffer, OfferExclusivity, ScopeType } from '../catalog/entities';
import {
  CATALOG_STORE,
  CatalogStore,
} from '../catalog/interfaces/catalog-store.interface';
import { LEADS_PROCESSED_TOTAL } from '../common/metrics.providers';
import {
  LeadNotFoundError,
  PolicyNotFoundError,
} from '../common/pipeline.error';
import {
  LEAD_STORE,
  LeadStore,
} from '../leads/interfaces/lead-store.interface';
import type { Lead } from '../leads/lead.entity';
import {
  RoutingPolicy,
  routingPolicySchema,
  RoutingStrategy,
} from './routing-policy.schema';
import { RoutingCandidate, routingStrategies } from './routing-strategies';
import { RoutingError } from './routing.error';

export type NoRouteReason =
  | 'lead_not_validated'
  | 'exclusive_buyer_ineligible'
  | 'no_eligible_buyers'
  | 'concurrent_routing_attempt';

export interface RoutingDecision {
  leadId: number;
  buyerId: number | null;
  exclusive: boolean;
  strategy: RoutingStrategy | null;
  noRouteReason: NoRouteReason | null;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

@Injectable()
export class RoutingService {
  private readonly logger = new Logger(RoutingService.name);

  constructor(
    @Inject(LEAD_STORE)
    private readonly leads: LeadStore,
    @Inject(CATALOG_STORE)
    private readonly catalog: CatalogStore,
    @Optional()
    @InjectMetric(LEADS_PROCESSED_TOTAL)
    private readonly leadsCounter?: Counter<string>,
  ) {}

  /**
   * Assigns a buyer to a validated lead: an eligible exclusive buyer for the
   * lead's postal code or city first, then the offer's strategy over every
   * eligible buyer covering the lead's location. A lead left without a buyer
   * stays `validated`.
   */
  async route(leadId: number, now = new Date()): Promise<RoutingDecision> {
    const lead = await this.leads.findById(leadId);
    if (!lead) {
      throw new LeadNotFoundError(leadId);
    }
    if (lead.status !== 'validated') {
      return {
        leadId,
        buyerId: lead.buyerId,
        exclusive: false,
        strategy: null,
        noRouteReason: 'lead_not_validated',
      };
    }
    if (lead.buyerId !== null) {
      return {
        leadId,
        buyerId: lead.buyerId,
        exclusive: false,
        strategy: null,
        noRouteReason: null,
      };
    }

    const policy = await this.loadPolicy(lead.offerId);

    const covering = new Set(
      await this.catalog.findCoveringBuyerIds(lead.marketId, {
        postalCode: lead.postalCode,
        city: lead.city,
      }),
    );

    const exclusivity = await this.findExclusivity(lead);
    if (exclusivity) {
      // an exclusive buyer still has to serve the lead's location
      const enrollment = covering.has(exclusivity.buyerId)
        ? await this.catalog.findEnrollment(exclusivity.buyerId, lead.offerId)
        : null;
      const candidate = enrollment
        ? await this.toCandidate(enrollment, now)
        : null;
      if (candidate) {
        return this.assign(lead, candidate.buyerId, true, policy.strategy);
      }
      if (policy.exclusivity_fallback === 'fail_closed') {
        this.logger.warn(
          `Lead ${leadId}: exclusive buyer ${exclusivity.buyerId} for ${exclusivity.scopeType} ${exclusivity.scopeValue} is ineligible`,
        );
        return this.noRoute(lead, 'exclusive_buyer_ineligible', policy.strategy);
      }
    }

    const enrollments = (await this.catalog.findEnrollments(lead.offerId)).filter(
      (enrollment) => covering.has(enrollment.buyerId),
    );

    const candidates: RoutingCandidate[] = [];
    for (const enrollment of enrollments) {
      const candidate = await this.toCandidate(enrollment, now);
      if (candidate) candidates.push(candidate);
    }

    const lastAssignedBuyerId =
      policy.strategy === 'round_robin'
        ? await this.leads.findLastAssignedBuyerId(lead.offerId)
        : null;
    const selected = routingStrategies[policy.strategy](candidates, {
      lastAssignedBuyerId,
    });
    if (!selected) {
      return this.noRoute(lead, 'no_eligible_buyers', policy.strategy);
    }
    return this.assign(lead, selected.buyerId, false, policy.strategy);
  }

  private async assign(
    lead: Lead,
    buyerId: number,
    exclusive: boolean,
    strategy: RoutingStrategy,
  ): Promise<RoutingDecision> {
    const outcome = await this.leads.assignBuyer(lead.id, buyerId);
    if (outcome.outcome === 'applied') {
      this.leadsCounter?.inc({ stage: 'routing', outcome: 'routed' });
      this.logger.log(
        `Lead ${lead.id} routed to buyer ${buyerId} (${exclusive ? 'exclusive' : strategy})`,
      );
      return { leadId: lead.id, buyerId, exclusive, strategy, noRouteReason: null };
    }

    // Lost a race: whichever buyer is on the row now is the answer
    const current = outcome.current;
    if (current?.buyerId != null) {
      this.logger.log(
        `Lead ${lead.id} was routed concurrently to buyer ${current.buyerId}`,
      );
      return {
        leadId: lead.id,
        buyerId: current.buyerId,
        exclusive,
        strategy,
        noRouteReason: null,
      };
    }
    return this.noRoute(lead, 'concurrent_routing_attempt', strategy);
  }

  private noRoute(
    lead: Lead,
    reason: NoRouteReason,
    strategy: RoutingStrategy,
  ): RoutingDecision {
    this.leadsCounter?.inc({ stage: 'routing', outcome: reason });
    this.logger.log(`Lead ${lead.id} not routed: ${reason}`);
    return {
      leadId: lead.id,
      buyerId: null,
      exclusive: false,
      strategy,
      noRouteReason: reason,
    };
  }

  private async findExclusivity(lead: Lead): Promise<OfferExclusivity | null> {
    const scopes: [ScopeType, string | null][] = [
      ['postal_code', lead.postalCode?.trim() || null],
      ['city', lead.city?.trim() || null],
    ];
    for (const [scopeType, value] of scopes) {
      if (value === null) continue;
      const exclusivity = await this.catalog.findActiveExclusivity(
        lead.offerId,
        scopeType,
        value,
      );
      if (exclusivity) return exclusivity;
    }
    return null;
  }

  /** null when the enrollment cannot take a lead right now */
  private async toCandidate(
    enrollment: BuyerOffer,
    now: Date,
  ): Promise<RoutingCandidate | null> {
    const { buyer } = enrollment;
    if (!enrollment.isActive || !buyer.isActive) return null;
    if (enrollment.pauseUntil && enrollment.pauseUntil.getTime() > now.getTime()) {
      return null;
    }
    if (
      enrollment.minBalanceRequired !== null &&
      buyer.balance < enrollment.minBalanceRequired
    ) {
      return null;
    }

    let remainingDaily: number | null = null;
    if (enrollment.capacityPerDay !== null) {
      const today = await this.leads.countDeliveredSince(
        enrollment.buyerId,
        enrollment.offerId,
        new Date(now.getTime() - DAY_MS),
      );
      if (today >= enrollment.capacityPerDay) return null;
      remainingDaily = enrollment.capacityPerDay - today;
    }
    if (enrollment.capacityPerHour !== null) {
      const lastHour = await this.leads.countDeliveredSince(
        enrollment.buyerId,
        enrollment.offerId,
        new Date(now.getTime() - HOUR_MS),
      );
      if (lastHour >= enrollment.capacityPerHour) return null;
    }

    return {
      buyerId: enrollment.buyerId,
      routingPriority: enrollment.routingPriority,
      remainingDaily,
    };
  }

  private async loadPolicy(offerId: number): Promise<RoutingPolicy> {
    const record = await this.catalog.findActiveRoutingPolicy(offerId);
    if (!record) {
      throw new PolicyNotFoundError('routing', offerId);
    }
    const parsed = routingPolicySchema.safeParse(record.document);
    if (!parsed.success) {
      throw RoutingError.invalidPolicy(
        record.id,
        offerId,
        parsed.error.issues.map((issue) => issue.message),
      );
    }
    return parsed.data;
  }
}
