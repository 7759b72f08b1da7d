import type { z } from 'zod';
import { MAX_TIMESTAMP, SHA1_HEX_LENGTH } from './constants.js';
import { PulseError } from './errors.js';

const LOWER_HEX_RE = /^[0-9a-f]+$/;
const DIGITS_RE = /^[0-9]+$/;

/**
 * Validate a Unix timestamp in whole seconds.
 *
 * @throws PulseError(SIGNING_FAILED) if negative, fractional, or beyond year 3000.
 */
export function pulseValidateTimestamp(timestamp: number): void {
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw PulseError.signingFailed('Timestamp must be a non-negative integer number of seconds');
  }
  if (timestamp > MAX_TIMESTAMP) {
    throw PulseError.signingFailed('Timestamp exceeds maximum allowed value');
  }
}

/**
 * Parse a decimal timestamp string (CLI input).
 *
 * - Digits only (no whitespace, no signs)
 * - No leading zeros (except "0" itself)
 */
export function pulseParseTimestamp(value: string): number {
  if (!DIGITS_RE.test(value)) {
    throw PulseError.signingFailed('Timestamp must contain only digits (0-9)');
  }
  if (value.length > 1 && value.startsWith('0')) {
    throw PulseError.signingFailed('Timestamp must not have leading zeros');
  }
  const timestamp = Number(value);
  pulseValidateTimestamp(timestamp);
  return timestamp;
}

/**
 * Validate a signature digest: exactly 40 lowercase hex characters.
 */
export function pulseValidateDigest(digest: string): void {
  if (digest.length !== SHA1_HEX_LENGTH) {
    throw PulseError.rulesMalformed(
      `Digest must be ${SHA1_HEX_LENGTH} hex characters, got ${digest.length}`,
    );
  }
  if (!LOWER_HEX_RE.test(digest)) {
    throw PulseError.rulesMalformed('Digest must contain only lowercase hexadecimal characters');
  }
}

/**
 * One-line summary of schema issues: `path: message; path: message`.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}
