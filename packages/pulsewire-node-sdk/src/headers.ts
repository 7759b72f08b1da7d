import { PulseError } from './errors.js';

// ── Header Name Constants ──────────────────────────────────────────

export const HEADER_ACCEPT = 'accept';
export const HEADER_USER_AGENT = 'user-agent';
export const HEADER_CLIENT_ID = 'x-bc';
export const HEADER_SUBJECT_ID = 'user-id';
export const HEADER_TIME = 'time';
export const HEADER_APP_TOKEN = 'app-token';
export const HEADER_SIGN = 'sign';

export const HEADER_COOKIE = 'cookie';
export const HEADER_CONTENT_TYPE = 'content-type';
export const HEADER_IF_MODIFIED_SINCE = 'if-modified-since';
export const HEADER_LAST_MODIFIED = 'last-modified';

// ── Types ──────────────────────────────────────────────────────────

/** The headers every signed request carries. Built per request. */
export interface SignedHeaderSet {
  readonly [HEADER_ACCEPT]: string;
  readonly [HEADER_USER_AGENT]: string;
  readonly [HEADER_CLIENT_ID]: string;
  readonly [HEADER_SUBJECT_ID]: string;
  readonly [HEADER_TIME]: string;
  readonly [HEADER_APP_TOKEN]: string;
  readonly [HEADER_SIGN]: string;
}

// ── Control character regex (ASCII 0-31 except tab 0x09, and DEL) ──

const CONTROL_CHAR_RE = /[\x00-\x08\x0A-\x1F\x7F]/;

/** Characters a header value cannot carry as a byte string. */
const NON_LATIN1_RE = /[^\x00-\xFF]/;

// ── Helpers ────────────────────────────────────────────────────────

/**
 * Reject a header value that cannot be sent on the wire.
 *
 * @throws PulseError(SIGNING_FAILED) on control characters or non-Latin-1 text.
 */
export function pulseValidateHeaderValue(value: string, headerName: string): void {
  if (CONTROL_CHAR_RE.test(value)) {
    throw PulseError.signingFailed(`Header ${headerName} contains invalid control characters`);
  }
  if (NON_LATIN1_RE.test(value)) {
    throw PulseError.signingFailed(`Header ${headerName} contains characters outside Latin-1`);
  }
}

/**
 * Case-insensitive header lookup.
 */
export function pulseGetHeader(
  headers: Readonly<Record<string, string>>,
  name: string,
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lowerName) {
      return headers[key];
    }
  }
  return undefined;
}
