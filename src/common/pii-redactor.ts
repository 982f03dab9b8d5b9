import { Injectable, Optional } from '@nestjs/common';
import { createHash } from 'crypto';

export type RedactionStrategy = 'mask' | 'hash' | 'truncate';

export interface RedactionConfig {
  sensitiveFields: string[];
  strategy: RedactionStrategy;
  truncateShowLast?: number;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Masks lead contact data before it reaches a log line or a gateway stub.
 * Field names are compared with `_`, `-` and spaces removed, so `postal_code`
 * and `postalCode` both match `postalcode`.
 */
@Injectable()
export class PIIRedactor {
  private readonly DEFAULT_CONFIG: RedactionConfig = {
    sensitiveFields: [
      'name',
      'email',
      'phone',
      'postalcode',
      'city',
      'message',
      'ipaddress',
      'useragent',
    ],
    strategy: 'truncate',
    truncateShowLast: 4,
  };

  private readonly config: RedactionConfig;

  constructor(@Optional() config?: RedactionConfig) {
    this.config = { ...this.DEFAULT_CONFIG, ...config };
  }

  redact(value: Record<string, unknown>): Record<string, unknown> {
    const redacted = this.redactValue(value);
    return isRecord(redacted) ? redacted : {};
  }

  forLogging(value: Record<string, unknown>): string {
    return JSON.stringify(this.redact(value));
  }

  maskEmail(email: string): string {
    const at = email.indexOf('@');
    if (at <= 0) {
      return this.applyStrategy(email);
    }
    return `${email.charAt(0)}***${email.slice(at)}`;
  }

  maskPhone(phone: string): string {
    const digits = phone.replace(/\D/g, '');
    if (digits.length < 4) {
      return '*'.repeat(digits.length);
    }
    return `***${digits.slice(-4)}`;
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return EMAIL_PATTERN.test(value) ? this.maskEmail(value) : value;
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.redactValue(item));
    }
    if (isRecord(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.isSensitiveField(key)
          ? this.redactField(key, entry)
          : this.redactValue(entry);
      }
      return result;
    }
    return value;
  }

  private isSensitiveField(key: string): boolean {
    const normalized = key.toLowerCase().replace(/[_\-\s]/g, '');
    return this.config.sensitiveFields.some(
      (field) => normalized === field.toLowerCase(),
    );
  }

  private redactField(key: string, value: unknown): unknown {
    if (value === null || value === undefined) {
      return value;
    }
    if (typeof value !== 'string') {
      return '[REDACTED]';
    }
    if (this.config.strategy === 'truncate') {
      const normalized = key.toLowerCase();
      if (normalized.includes('email')) return this.maskEmail(value);
      if (normalized.includes('phone')) return this.maskPhone(value);
    }
    return this.applyStrategy(value);
  }

  private applyStrategy(value: string): string {
    switch (this.config.strategy) {
      case 'mask':
        return '*'.repeat(Math.min(value.length, 20));
      case 'hash':
        return createHash('sha256').update(value).digest('hex').slice(0, 16);
      case 'truncate': {
        const showLast = this.config.truncateShowLast ?? 4;
        if (value.length <= showLast) {
          return '*'.repeat(value.length);
        }
        return `***${value.slice(-showLast)}`;
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
