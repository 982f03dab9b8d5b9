import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';
import { PipelineError } from '../common/pipeline.error';
import { normalizeEmail, normalizePhone } from '../leads/normalization';

const IDEMPOTENCY_KEY_PATTERN = /^[A-Za-z0-9._:-]{16,128}$/;

export class IdempotencyError extends PipelineError {
  constructor(code: string, message: string) {
    super(code, message, 400);
  }
}

export interface KeyDerivationInput {
  sourceId: number;
  name?: string | null;
  email?: string | null;
  phone?: string | null;
  countryCode?: string | null;
  postalCode?: string | null;
  message?: string | null;
}

/**
 * Produces the key that scopes "the same logical submission" within a
 * source. Client keys are validated, otherwise one is derived from content.
 */
@Injectable()
export class IdempotencyService {
  canonicalize(idempotencyKey: string): string {
    const key = idempotencyKey.trim();
    if (!IDEMPOTENCY_KEY_PATTERN.test(key)) {
      throw new IdempotencyError(
        'invalid_idempotency_key_format',
        'idempotency_key must be 16-128 characters of [A-Za-z0-9._:-]',
      );
    }
    return key;
  }

  /**
   * SHA-256 over a newline-joined, fixed-order tuple. Field order is part of
   * the key format: reordering it changes every derived key.
   */
  derive(input: KeyDerivationInput): string {
    if (!Number.isInteger(input.sourceId) || input.sourceId <= 0) {
      throw new IdempotencyError(
        'invalid_source_id',
        'source_id must be a positive integer to derive a key',
      );
    }

    const parts = [
      String(input.sourceId),
      (input.name ?? '').trim(),
      normalizeEmail(input.email) ?? '',
      normalizePhone(input.phone) ?? '',
      (input.countryCode ?? '').trim().toUpperCase(),
      (input.postalCode ?? '').trim().toUpperCase(),
      (input.message ?? '').trim(),
    ];

    return createHash('sha256').update(parts.join('\n'), 'utf8').digest('hex');
  }
}
