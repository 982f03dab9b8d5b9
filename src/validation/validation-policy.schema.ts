import { z } from 'zod';
import type { Lead } from '../leads/lead.entity';

export const LEAD_FIELDS = [
  'name',
  'email',
  'phone',
  'country_code',
  'postal_code',
  'city',
  'region_code',
  'message',
  'source',
  'utm_source',
  'utm_medium',
  'utm_campaign',
] as const;

export type LeadField = (typeof LEAD_FIELDS)[number];

const leadField = z.enum(LEAD_FIELDS);

const ruleSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('required_fields'),
    fields: z.array(leadField).min(1),
  }),
  z.object({
    type: z.literal('allowed_values'),
    field: leadField,
    values: z.array(z.string()).min(1),
    case_insensitive: z.boolean().default(false),
  }),
  z.object({
    type: z.literal('format'),
    field: leadField,
    pattern: z.string().min(1),
  }),
  z.object({
    type: z.literal('disposable_email'),
    domains: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    type: z.literal('geographic_restriction'),
    postal_codes: z.array(z.string()).default([]),
    cities: z.array(z.string()).default([]),
  }),
]);

/**
 * Other top-level keys (e.g. `duplicate_detection`) belong to other stages
 * and pass through untouched.
 */
export const validationPolicyDocumentSchema = z
  .object({
    enabled: z.boolean().default(true),
    rules: z.array(ruleSchema).default([]),
  })
  .passthrough();

export type ValidationRule = z.infer<typeof ruleSchema>;

export const fieldValue: Record<LeadField, (lead: Lead) => string | null> = {
  name: (lead) => lead.name,
  email: (lead) => lead.email,
  phone: (lead) => lead.phone,
  country_code: (lead) => lead.countryCode,
  postal_code: (lead) => lead.postalCode,
  city: (lead) => lead.city,
  region_code: (lead) => lead.regionCode,
  message: (lead) => lead.message,
  source: (lead) => lead.source,
  utm_source: (lead) => lead.utmSource,
  utm_medium: (lead) => lead.utmMedium,
  utm_campaign: (lead) => lead.utmCampaign,
};
