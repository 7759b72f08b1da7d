import {
  ACCEPT_HEADER_VALUE,
  SIGN_FIELD_DELIMITER,
  SIGN_PART_DELIMITER,
} from './constants.js';
import { PulseError } from './errors.js';
import { pulseSha1Hex } from './hash.js';
import {
  HEADER_ACCEPT,
  HEADER_APP_TOKEN,
  HEADER_CLIENT_ID,
  HEADER_SIGN,
  HEADER_SUBJECT_ID,
  HEADER_TIME,
  HEADER_USER_AGENT,
  pulseValidateHeaderValue,
} from './headers.js';
import type { SignedHeaderSet } from './headers.js';
import type { DynamicRules } from './rules.js';
import { pulseValidateTimestamp } from './validate.js';

// ── Types ──────────────────────────────────────────────────────────

/** Who a request is signed for. */
export interface SigningSubject {
  subjectId: string;
  clientId: string;
  userAgent: string;
}

export interface SignatureParts {
  path: string;
  digest: string;
  checksum: string;
  sign: string;
}

// ── Steps ──────────────────────────────────────────────────────────

/**
 * Path component that is signed: the URL path, plus `?` and the query when
 * the URL has one. The fragment never takes part.
 */
export function pulseBuildSignPath(url: string | URL): string {
  let parsed: URL;
  try {
    parsed = typeof url === 'string' ? new URL(url) : url;
  } catch {
    throw PulseError.signingFailed('Request URL is not an absolute URL');
  }

  if (parsed.search.length > 0) {
    return parsed.pathname + parsed.search;
  }

  // `https://host/a?` has an empty but present query; URL.search hides it.
  const withoutFragment = parsed.href.slice(0, parsed.href.length - parsed.hash.length);
  return withoutFragment.endsWith('?') ? `${parsed.pathname}?` : parsed.pathname;
}

/**
 * Checksum term: |Σ charCode(signature[i]) + constant|, as lowercase hex.
 *
 * @throws PulseError(RULES_MALFORMED) if an index falls outside the signature.
 */
export function pulseComputeChecksum(
  signature: string,
  indexes: readonly number[],
  constant: number,
): string {
  let sum = 0;
  for (const index of indexes) {
    if (!Number.isInteger(index) || index < 0 || index >= signature.length) {
      throw PulseError.rulesMalformed(
        `Checksum index ${index} is out of range for a signature of length ${signature.length}`,
      );
    }
    sum += signature.charCodeAt(index);
  }
  return Math.abs(sum + constant).toString(16);
}

/** The hashed message: static param, time, path and subject id, one per line. */
export function pulseComposeSignMessage(
  rules: DynamicRules,
  subjectId: string,
  path: string,
  time: string,
): string {
  return [rules.staticParam, time, path, subjectId].join(SIGN_FIELD_DELIMITER);
}

/** `prefix:digest:checksum:suffix` */
export function pulseJoinSign(rules: DynamicRules, digest: string, checksum: string): string {
  return [rules.prefix, digest, checksum, rules.suffix].join(SIGN_PART_DELIMITER);
}

/**
 * Compute the digest, checksum and `sign` value for an already-built path.
 */
export function pulseBuildSignature(
  rules: DynamicRules,
  subjectId: string,
  path: string,
  time: string,
): SignatureParts {
  const digest = pulseSha1Hex(pulseComposeSignMessage(rules, subjectId, path, time));
  const checksum = pulseComputeChecksum(digest, rules.checksumIndexes, rules.checksumConstant);
  return { path, digest, checksum, sign: pulseJoinSign(rules, digest, checksum) };
}

/**
 * Assemble the header set from precomputed parts. Every value is validated
 * for the wire.
 */
export function pulseAssembleHeaders(
  rules: DynamicRules,
  subject: SigningSubject,
  time: string,
  sign: string,
): SignedHeaderSet {
  const values: ReadonlyArray<readonly [string, string]> = [
    [HEADER_USER_AGENT, subject.userAgent],
    [HEADER_CLIENT_ID, subject.clientId],
    [HEADER_SUBJECT_ID, subject.subjectId],
    [HEADER_TIME, time],
    [HEADER_APP_TOKEN, rules.appToken],
    [HEADER_SIGN, sign],
  ];
  for (const [name, value] of values) {
    pulseValidateHeaderValue(value, name);
  }

  return {
    [HEADER_ACCEPT]: ACCEPT_HEADER_VALUE,
    [HEADER_USER_AGENT]: subject.userAgent,
    [HEADER_CLIENT_ID]: subject.clientId,
    [HEADER_SUBJECT_ID]: subject.subjectId,
    [HEADER_TIME]: time,
    [HEADER_APP_TOKEN]: rules.appToken,
    [HEADER_SIGN]: sign,
  };
}

// ── Main Function ──────────────────────────────────────────────────

/**
 * Sign a request.
 *
 * 1. Build the signed path
 * 2. Join static param, time, path and subject id with newlines
 * 3. SHA-1 hex digest
 * 4. Checksum over the configured digest offsets
 * 5. `prefix:digest:checksum:suffix`
 * 6. Header set, all sharing the single `time` value
 *
 * Pure: the same inputs always give the same headers.
 *
 * @param timestamp Unix seconds.
 * @throws PulseError(RULES_MALFORMED) on an out-of-range checksum index.
 * @throws PulseError(SIGNING_FAILED) on a bad URL, timestamp or header value.
 */
export function pulseSign(
  rules: DynamicRules,
  subject: SigningSubject,
  url: string | URL,
  timestamp: number,
): SignedHeaderSet {
  pulseValidateTimestamp(timestamp);
  const time = String(timestamp);
  const path = pulseBuildSignPath(url);
  const { sign } = pulseBuildSignature(rules, subject.subjectId, path, time);
  return pulseAssembleHeaders(rules, subject, time, sign);
}
