import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import {
  CATALOG_STORE,
  CatalogStore,
  PolicyRecord,
} from '../catalog/interfaces/catalog-store.interface';
import { LEADS_PROCESSED_TOTAL } from '../common/metrics.providers';
import {
  LeadNotFoundError,
  PipelineError,
  PolicyNotFoundError,
} from '../common/pipeline.error';
import {
  LEAD_STORE,
  LeadStore,
  TransitionOutcome,
} from '../leads/interfaces/lead-store.interface';
import type { Lead, LeadStatus, ValidationRecord } from '../leads/lead.entity';
import { transitionReached } from '../leads/lead-transitions';
import { validationPolicyDocumentSchema } from './validation-policy.schema';
import { CompiledRule, compileRule, evaluateRule } from './validation-rules';

export const MAX_VALIDATION_RULES = 50;

export interface ValidationOutcome {
  leadId: number;
  valid: boolean;
  status: LeadStatus;
  reason: string | null;
}

interface CompiledPolicy {
  id: number;
  version: number;
  enabled: boolean;
  rules: CompiledRule[];
}

@Injectable()
export class ValidationService {
  private readonly logger = new Logger(ValidationService.name);
  private readonly policyCache = new Map<string, CompiledPolicy>();

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
   * Evaluates the offer's validation policy against a `received` lead and
   * moves it to `validated` or `rejected`. Any other status is reported as-is.
   */
  async validate(leadId: number): Promise<ValidationOutcome> {
    const lead = await this.leads.findById(leadId);
    if (!lead) {
      throw new LeadNotFoundError(leadId);
    }
    if (lead.status !== 'received') {
      return this.describe(lead);
    }

    const record = await this.catalog.findActiveValidationPolicy(lead.offerId);
    if (!record) {
      throw new PolicyNotFoundError('validation', lead.offerId);
    }
    const policy = this.compile(record, lead.offerId);

    const rules = policy.enabled ? policy.rules.slice(0, MAX_VALIDATION_RULES) : [];
    let rulesEvaluated = 0;
    for (const rule of rules) {
      rulesEvaluated++;
      const verdict = evaluateRule(rule, lead);
      if (!verdict.passed) {
        const result: ValidationRecord = {
          policyId: policy.id,
          policyVersion: policy.version,
          rulesEvaluated,
          failedRule: rule.type,
          reason: verdict.reason,
        };
        const outcome = await this.leads.markRejected(
          leadId,
          verdict.reason,
          result,
        );
        return this.settle(leadId, outcome, 'rejected');
      }
    }

    const outcome = await this.leads.markValidated(leadId, {
      policyId: policy.id,
      policyVersion: policy.version,
      rulesEvaluated,
      failedRule: null,
      reason: null,
    });
    return this.settle(leadId, outcome, 'validated');
  }

  private async settle(
    leadId: number,
    outcome: TransitionOutcome,
    target: 'validated' | 'rejected',
  ): Promise<ValidationOutcome> {
    if (outcome.outcome === 'applied') {
      this.leadsCounter?.inc({ stage: 'validation', outcome: target });
      const lead = await this.leads.findById(leadId);
      if (!lead) {
        throw new LeadNotFoundError(leadId);
      }
      this.logger.log(
        `Lead ${leadId} ${target}${lead.validationReason ? ` (${lead.validationReason})` : ''}`,
      );
      return this.describe(lead);
    }

    if (!outcome.current) {
      throw new LeadNotFoundError(leadId);
    }
    this.logger.warn(
      `Lead ${leadId} was already ${outcome.current.status} when validation tried to mark it ${target}`,
    );
    return this.describe(outcome.current);
  }

  private describe(lead: Lead): ValidationOutcome {
    return {
      leadId: lead.id,
      valid: transitionReached.validated(lead),
      status: lead.status,
      reason: lead.validationReason,
    };
  }

  private compile(record: PolicyRecord, offerId: number): CompiledPolicy {
    const cacheKey = `${record.id}:${record.version}`;
    const cached = this.policyCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const parsed = validationPolicyDocumentSchema.safeParse(record.document);
    if (!parsed.success) {
      throw new PipelineError(
        'invalid_validation_policy',
        `Validation policy ${record.id} v${record.version} is malformed`,
        422,
        {
          offer_id: offerId,
          issues: parsed.error.issues.map((issue) => issue.message),
        },
      );
    }
    if (parsed.data.rules.length > MAX_VALIDATION_RULES) {
      this.logger.warn(
        `Validation policy ${record.id} has ${parsed.data.rules.length} rules; only the first ${MAX_VALIDATION_RULES} are evaluated`,
      );
    }

    const compiled: CompiledPolicy = {
      id: record.id,
      version: record.version,
      enabled: parsed.data.enabled,
      rules: parsed.data.rules.map((rule) =>
        compileRule(rule, (pattern, error) =>
          this.logger.error(
            `Validation policy ${record.id}: pattern ${pattern} does not compile: ${error instanceof Error ? error.message : 'Unknown error'}`,
          ),
        ),
      ),
    };
    this.policyCache.set(cacheKey, compiled);
    return compiled;
  }
}
