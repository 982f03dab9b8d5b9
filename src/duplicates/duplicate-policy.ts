import { z } from 'zod';
import { LEAD_STATUSES } from '../leads/lead.entity';

const matchKey = z.enum(['phone', 'email']);

export const duplicatePolicySchema = z.object({
  enabled: z.boolean().default(false),
  window_hours: z.number().int().min(1).max(8760).default(24),
  scope: z.literal('offer').default('offer'),
  keys: z.array(matchKey).min(1).default(['phone', 'email']),
  match_mode: z.enum(['any', 'all']).default('any'),
  exclude_statuses: z.array(z.enum(LEAD_STATUSES)).default(['rejected']),
  include_sources: z.enum(['any', 'same_source_only']).default('any'),
  action: z.enum(['reject', 'flag', 'accept']).default('reject'),
  reason_code: z.string().min(1).max(64).default('duplicate_lead'),
  min_fields: z.array(matchKey).default([]),
});

export type DuplicatePolicy = z.infer<typeof duplicatePolicySchema>;
export type DuplicateAction = DuplicatePolicy['action'];
export type MatchKey = z.infer<typeof matchKey>;

export const DISABLED_DUPLICATE_POLICY: DuplicatePolicy =
  duplicatePolicySchema.parse({});
