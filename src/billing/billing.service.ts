import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import {
  CATALOG_STORE,
  CatalogStore,
} from '../catalog/interfaces/catalog-store.interface';
import { LEADS_BILLED_TOTAL } from '../common/metrics.providers';
import {
  LEAD_STORE,
  LeadStore,
} from '../leads/interfaces/lead-store.interface';

export type BillingSkipReason =
  | 'lead_not_found'
  | 'lead_not_delivered'
  | 'no_buyer_assigned'
  | 'already_billed'
  | 'price_unavailable'
  | 'billing_error';

export interface BillingResult {
  leadId: number;
  billed: boolean;
  price: number | null;
  reason: BillingSkipReason | null;
}

@Injectable()
export class BillingService {
  private readonly logger = new Logger(BillingService.name);

  constructor(
    @Inject(LEAD_STORE)
    private readonly leads: LeadStore,
    @Inject(CATALOG_STORE)
    private readonly catalog: CatalogStore,
    @Optional()
    @InjectMetric(LEADS_BILLED_TOTAL)
    private readonly billedCounter?: Counter<string>,
  ) {}

  /**
   * Charges the assigned buyer for a delivered lead at most once. Safe to call
   * repeatedly; never throws.
   */
  async billLead(leadId: number): Promise<BillingResult> {
    try {
      const lead = await this.leads.findById(leadId);
      if (!lead) {
        return this.skip(leadId, 'lead_not_found');
      }
      if (lead.billingStatus !== 'pending') {
        return { leadId, billed: false, price: lead.price, reason: 'already_billed' };
      }
      if (lead.status !== 'delivered') {
        return this.skip(leadId, 'lead_not_delivered');
      }
      if (lead.buyerId === null) {
        return this.skip(leadId, 'no_buyer_assigned');
      }

      const price = await this.resolvePrice(lead.buyerId, lead.offerId);
      if (price === null) {
        this.logger.error(
          `Lead ${leadId}: no price for buyer ${lead.buyerId} on offer ${lead.offerId}`,
        );
        return this.skip(leadId, 'price_unavailable');
      }

      const outcome = await this.leads.recordBilling(leadId, lead.buyerId, price);
      if (outcome.outcome !== 'applied') {
        this.billedCounter?.inc({ outcome: 'duplicate' });
        return {
          leadId,
          billed: false,
          price: outcome.current?.price ?? null,
          reason:
            outcome.outcome === 'already_applied'
              ? 'already_billed'
              : 'lead_not_delivered',
        };
      }

      this.billedCounter?.inc({ outcome: 'billed' });
      this.logger.log(
        `Lead ${leadId} billed to buyer ${lead.buyerId} at ${price.toFixed(2)}`,
      );
      return { leadId, billed: true, price, reason: null };
    } catch (error) {
      this.billedCounter?.inc({ outcome: 'error' });
      this.logger.error(
        `Billing failed for lead ${leadId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return this.skip(leadId, 'billing_error');
    }
  }

  /** enrollment price, then the buyer's default, then the offer's default */
  private async resolvePrice(
    buyerId: number,
    offerId: number,
  ): Promise<number | null> {
    const enrollment = await this.catalog.findEnrollment(buyerId, offerId);
    if (enrollment?.pricePerLead != null) {
      return enrollment.pricePerLead;
    }
    const buyer = enrollment?.buyer ?? (await this.catalog.findBuyer(buyerId));
    if (buyer?.defaultPricePerLead != null) {
      return buyer.defaultPricePerLead;
    }
    const offer = await this.catalog.findOffer(offerId);
    return offer?.defaultPricePerLead ?? null;
  }

  private skip(leadId: number, reason: BillingSkipReason): BillingResult {
    return { leadId, billed: false, price: null, reason };
  }
}
