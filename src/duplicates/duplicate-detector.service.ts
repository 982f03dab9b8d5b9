import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import {
  CATALOG_STORE,
  CatalogStore,
} from '../catalog/interfaces/catalog-store.interface';
import { LEADS_PROCESSED_TOTAL } from '../common/metrics.providers';
import { PipelineError } from '../common/pipeline.error';
import {
  LEAD_STORE,
  LeadStore,
  NormalizedContact,
} from '../leads/interfaces/lead-store.interface';
import { normalizeEmail, normalizePhone } from '../leads/normalization';
import {
  DISABLED_DUPLICATE_POLICY,
  DuplicateAction,
  DuplicatePolicy,
  duplicatePolicySchema,
  MatchKey,
} from './duplicate-policy';

export interface DuplicateResult {
  isDuplicate: boolean;
  action: DuplicateAction | null;
  matchedLeadId: number | null;
  matchedKeys: MatchKey[];
}

const NO_SIGNAL: DuplicateResult = {
  isDuplicate: false,
  action: null,
  matchedLeadId: null,
  matchedKeys: [],
};

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class DuplicateDetectorService {
  private readonly logger = new Logger(DuplicateDetectorService.name);

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
   * Compares a freshly admitted lead against recent leads of its offer.
   * Only a `received` lead is examined; later statuses already passed this
   * stage.
   */
  async detect(leadId: number, now = new Date()): Promise<DuplicateResult> {
    const lead = await this.leads.findById(leadId);
    if (!lead || lead.status !== 'received') {
      return NO_SIGNAL;
    }

    const normalized: NormalizedContact = {
      normalizedPhone: normalizePhone(lead.phone),
      normalizedEmail: normalizeEmail(lead.email),
    };
    await this.leads.saveNormalizedContact(leadId, normalized);

    const policy = await this.loadPolicy(lead.offerId);
    if (!policy.enabled) {
      return NO_SIGNAL;
    }

    const contact: NormalizedContact = {
      normalizedPhone: policy.keys.includes('phone')
        ? normalized.normalizedPhone
        : null,
      normalizedEmail: policy.keys.includes('email')
        ? normalized.normalizedEmail
        : null,
    };

    const missing = policy.min_fields.filter((field) =>
      field === 'phone'
        ? contact.normalizedPhone === null
        : contact.normalizedEmail === null,
    );
    if (missing.length > 0) {
      this.logger.debug(
        `Lead ${leadId}: skipping duplicate check, missing ${missing.join(', ')}`,
      );
      return NO_SIGNAL;
    }
    if (contact.normalizedPhone === null && contact.normalizedEmail === null) {
      return NO_SIGNAL;
    }

    const match = await this.leads.findLatestDuplicate({
      ...contact,
      leadId,
      offerId: lead.offerId,
      sourceId:
        policy.include_sources === 'same_source_only' ? lead.sourceId : null,
      createdSince: new Date(now.getTime() - policy.window_hours * HOUR_MS),
      excludeStatuses: policy.exclude_statuses,
      matchMode: policy.match_mode,
    });
    if (!match) {
      return NO_SIGNAL;
    }

    const matchedKeys: MatchKey[] = [];
    if (
      contact.normalizedPhone !== null &&
      match.normalizedPhone === contact.normalizedPhone
    ) {
      matchedKeys.push('phone');
    }
    if (
      contact.normalizedEmail !== null &&
      match.normalizedEmail === contact.normalizedEmail
    ) {
      matchedKeys.push('email');
    }

    const outcome = await this.leads.markDuplicate(
      leadId,
      match.leadId,
      policy.action === 'reject' ? policy.reason_code : null,
    );
    if (outcome.outcome === 'conflict') {
      this.logger.warn(
        `Lead ${leadId} moved to ${outcome.current?.status ?? 'missing'} before duplicate ${policy.action}`,
      );
    }

    this.leadsCounter?.inc({ stage: 'duplicate', outcome: policy.action });
    this.logger.log(
      `Lead ${leadId} duplicates lead ${match.leadId} on ${matchedKeys.join('+')} (action: ${policy.action})`,
    );

    return {
      isDuplicate: true,
      action: policy.action,
      matchedLeadId: match.leadId,
      matchedKeys,
    };
  }

  private async loadPolicy(offerId: number): Promise<DuplicatePolicy> {
    const record = await this.catalog.findActiveValidationPolicy(offerId);
    const raw = record?.document['duplicate_detection'];
    if (raw === undefined || raw === null) {
      return DISABLED_DUPLICATE_POLICY;
    }

    const parsed = duplicatePolicySchema.safeParse(raw);
    if (!parsed.success) {
      const windowIssue = parsed.error.issues.some(
        (issue) => issue.path[0] === 'window_hours',
      );
      throw new PipelineError(
        windowIssue ? 'invalid_window_hours' : 'invalid_duplicate_policy',
        `Duplicate policy for offer ${offerId} is malformed`,
        422,
        { offer_id: offerId, issues: parsed.error.issues.map((i) => i.message) },
      );
    }
    return parsed.data;
  }
}
