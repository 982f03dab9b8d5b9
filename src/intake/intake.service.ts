import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AdmissionService,
  LeadSubmission,
} from '../admission/admission.service';
import {
  ClassificationInput,
  ClassificationService,
} from '../classification/classification.service';
import { LeadNotFoundError } from '../common/pipeline.error';
import { DeliveryQueueService } from '../delivery/delivery-queue.service';
import { DuplicateDetectorService } from '../duplicates/duplicate-detector.service';
import {
  LEAD_STORE,
  LeadStore,
} from '../leads/interfaces/lead-store.interface';
import type { LeadStatus } from '../leads/lead.entity';
import { RoutingService } from '../routing/routing.service';
import { ValidationService } from '../validation/validation.service';

export interface IntakeRequest {
  classification: ClassificationInput;
  submission: LeadSubmission;
}

export interface IngestResponse {
  lead_id: number;
  status: LeadStatus;
  source_id: number;
  offer_id: number;
  market_id: number;
  vertical_id: number;
  idempotency_key: string;
  buyer_id: number | null;
  price: number | null;
}

/**
 * Runs one submission through classification, admission, duplicate
 * detection, validation and routing, then hands a routed lead to the
 * delivery queue. Every stage is a no-op on a lead that is already past it,
 * so a replayed submission resumes from the persisted state.
 */
@Injectable()
export class IntakeService {
  private readonly logger = new Logger(IntakeService.name);

  constructor(
    private readonly classification: ClassificationService,
    private readonly admission: AdmissionService,
    private readonly duplicates: DuplicateDetectorService,
    private readonly validation: ValidationService,
    private readonly routing: RoutingService,
    private readonly deliveryQueue: DeliveryQueueService,
    @Inject(LEAD_STORE)
    private readonly leads: LeadStore,
  ) {}

  async ingest(request: IntakeRequest): Promise<IngestResponse> {
    const attribution = await this.classification.resolve(
      request.classification,
    );
    const { leadId, createdNew, idempotencyKey } = await this.admission.admit(
      attribution,
      request.submission,
    );

    await this.duplicates.detect(leadId);
    const validation = await this.validation.validate(leadId);

    if (validation.status === 'validated') {
      const decision = await this.routing.route(leadId);
      if (decision.buyerId !== null) {
        await this.deliveryQueue.enqueue(leadId);
      } else {
        this.logger.log(
          `Lead ${leadId} left unrouted: ${decision.noRouteReason ?? 'unknown'}`,
        );
      }
    }

    const lead = await this.leads.findById(leadId);
    if (!lead) {
      throw new LeadNotFoundError(leadId);
    }
    if (!createdNew) {
      this.logger.debug(`Replayed submission for lead ${leadId} is ${lead.status}`);
    }

    return {
      lead_id: lead.id,
      status: lead.status,
      source_id: attribution.sourceId,
      offer_id: attribution.offerId,
      market_id: attribution.marketId,
      vertical_id: attribution.verticalId,
      idempotency_key: idempotencyKey,
      buyer_id: lead.buyerId,
      price: lead.price,
    };
  }
}
