import type { Lead } from '../leads/lead.entity';
import {
  fieldValue,
  LeadField,
  ValidationRule,
} from './validation-policy.schema';

/** A rule with its pattern compiled; `regex` is null for an unusable pattern */
export type CompiledRule =
  | Exclude<ValidationRule, { type: 'format' }>
  | (Extract<ValidationRule, { type: 'format' }> & { regex: RegExp | null });

export type RuleVerdict = { passed: true } | { passed: false; reason: string };

const PASS: RuleVerdict = { passed: true };

export function compileRule(
  rule: ValidationRule,
  onInvalidPattern: (pattern: string, error: unknown) => void,
): CompiledRule {
  if (rule.type !== 'format') {
    return rule;
  }
  try {
    return { ...rule, regex: new RegExp(rule.pattern) };
  } catch (error) {
    onInvalidPattern(rule.pattern, error);
    return { ...rule, regex: null };
  }
}

function present(lead: Lead, field: LeadField): string | null {
  const value = fieldValue[field](lead)?.trim();
  return value ? value : null;
}

const lower = (value: string) => value.toLowerCase();

export function evaluateRule(rule: CompiledRule, lead: Lead): RuleVerdict {
  switch (rule.type) {
    case 'required_fields': {
      const missing = rule.fields.find((field) => present(lead, field) === null);
      return missing
        ? { passed: false, reason: `required_field_missing_${missing}` }
        : PASS;
    }

    case 'allowed_values': {
      const value = present(lead, rule.field);
      if (value === null) return PASS;
      const allowed = rule.case_insensitive
        ? rule.values.map(lower).includes(lower(value))
        : rule.values.includes(value);
      return allowed
        ? PASS
        : { passed: false, reason: `invalid_value_${rule.field}` };
    }

    case 'format': {
      const value = present(lead, rule.field);
      if (value === null || rule.regex === null) return PASS;
      return rule.regex.test(value)
        ? PASS
        : { passed: false, reason: `invalid_format_${rule.field}` };
    }

    case 'disposable_email': {
      const email = present(lead, 'email');
      const domain = email?.split('@').pop();
      if (!email || !domain) return PASS;
      return rule.domains.map(lower).includes(lower(domain))
        ? { passed: false, reason: 'disposable_email' }
        : PASS;
    }

    case 'geographic_restriction': {
      if (rule.postal_codes.length === 0 && rule.cities.length === 0) {
        return PASS;
      }
      const postalCode = present(lead, 'postal_code');
      const city = present(lead, 'city');
      const postalAllowed =
        postalCode !== null &&
        rule.postal_codes.map(lower).includes(lower(postalCode));
      const cityAllowed =
        city !== null && rule.cities.map(lower).includes(lower(city));
      return postalAllowed || cityAllowed
        ? PASS
        : { passed: false, reason: 'outside_service_area' };
    }
  }
}
