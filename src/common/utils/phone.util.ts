import { DomainError, ErrorKind } from '../errors';

const E164 = /^\+?[1-9]\d{7,14}$/;

/** E.164 form of `phone`, or undefined when it is not a phone number. */
export function tryNormalizePhone(phone: string): string | undefined {
  const digitsOnly = (phone || '').trim().replace(/[\s\-().]/g, '');
  if (!E164.test(digitsOnly)) return undefined;
  return digitsOnly.startsWith('+') ? digitsOnly : `+${digitsOnly}`;
}

/** Normalizes to E.164 (`+` and 8-15 digits), ignoring spaces, dashes and brackets. */
export function normalizePhone(phone: string): string {
  const normalized = tryNormalizePhone(phone);
  if (!normalized) {
    throw new DomainError(ErrorKind.VALIDATION_FAILED, 'Invalid phone number', {
      phone: ['must be an international number such as +15551234567'],
    });
  }
  return normalized;
}
