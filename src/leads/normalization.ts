const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const E164_PATTERN = /^\+[1-9]\d{7,15}$/;
const MIN_PHONE_DIGITS = 7;

/** Lowercased, trimmed address; null when empty or not address-shaped */
export function normalizeEmail(email: string | null | undefined): string | null {
  const value = (email ?? '').trim().toLowerCase();
  if (!value || !EMAIL_PATTERN.test(value)) {
    return null;
  }
  return value;
}

/**
 * E.164 numbers are kept as-is; anything else is reduced to its digits.
 * Fewer than 7 digits yields null.
 */
export function normalizePhone(phone: string | null | undefined): string | null {
  const value = (phone ?? '').trim();
  if (!value) {
    return null;
  }
  if (E164_PATTERN.test(value)) {
    return value;
  }
  const digits = value.replace(/\D/g, '');
  return digits.length >= MIN_PHONE_DIGITS ? digits : null;
}
