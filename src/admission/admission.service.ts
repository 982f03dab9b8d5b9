import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Attribution } from '../catalog/interfaces/catalog-store.interface';
import {
  LEAD_STORE,
  LeadStore,
} from '../leads/interfaces/lead-store.interface';
import { IdempotencyService } from './idempotency.service';

export interface LeadSubmission {
  idempotencyKey?: string | null;
  source?: string | null;
  name?: string | null;
  email?: string | null;
  phone?: string | null;
  countryCode?: string | null;
  postalCode?: string | null;
  city?: string | null;
  regionCode?: string | null;
  message?: string | null;
  utmSource?: string | null;
  utmMedium?: string | null;
  utmCampaign?: string | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AdmissionResult {
  leadId: number;
  createdNew: boolean;
  idempotencyKey: string;
}

const trimmedOrNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Turns a classified submission into exactly one lead row. Re-submissions
 * with the same (source, key) resolve to the existing row unchanged.
 */
@Injectable()
export class AdmissionService {
  private readonly logger = new Logger(AdmissionService.name);

  constructor(
    @Inject(LEAD_STORE)
    private readonly leads: LeadStore,
    private readonly idempotency: IdempotencyService,
  ) {}

  async admit(
    attribution: Attribution,
    submission: LeadSubmission,
  ): Promise<AdmissionResult> {
    const idempotencyKey = submission.idempotencyKey
      ? this.idempotency.canonicalize(submission.idempotencyKey)
      : this.idempotency.derive({
          sourceId: attribution.sourceId,
          name: submission.name,
          email: submission.email,
          phone: submission.phone,
          countryCode: submission.countryCode,
          postalCode: submission.postalCode,
          message: submission.message,
        });

    const { leadId, createdNew } = await this.leads.insertOrGet({
      ...attribution,
      idempotencyKey,
      source: trimmedOrNull(submission.source) ?? 'landing_page',
      name: trimmedOrNull(submission.name),
      email: trimmedOrNull(submission.email),
      phone: trimmedOrNull(submission.phone),
      countryCode: (trimmedOrNull(submission.countryCode) ?? 'US').toUpperCase(),
      postalCode: trimmedOrNull(submission.postalCode),
      city: trimmedOrNull(submission.city),
      regionCode: trimmedOrNull(submission.regionCode),
      message: trimmedOrNull(submission.message),
      utmSource: trimmedOrNull(submission.utmSource),
      utmMedium: trimmedOrNull(submission.utmMedium),
      utmCampaign: trimmedOrNull(submission.utmCampaign),
      ipAddress: trimmedOrNull(submission.ipAddress),
      userAgent: trimmedOrNull(submission.userAgent),
    });

    if (createdNew) {
      this.logger.log(
        `Admitted lead ${leadId} for source ${attribution.sourceId} (offer ${attribution.offerId})`,
      );
    } else {
      this.logger.debug(
        `Replay of key ${idempotencyKey.slice(0, 8)}... resolved to lead ${leadId}`,
      );
    }

    return { leadId, createdNew, idempotencyKey };
  }
}
