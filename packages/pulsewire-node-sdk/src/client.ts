import type { z } from 'zod';
import { PulseAuthHolder } from './auth-context.js';
import type { AuthContext } from './auth-context.js';
import { PulseError, errorMessage } from './errors.js';
import {
  HEADER_CONTENT_TYPE,
  HEADER_COOKIE,
  HEADER_IF_MODIFIED_SINCE,
  HEADER_LAST_MODIFIED,
} from './headers.js';
import { PulseFetchTransport, isSuccessStatus } from './http-transport.js';
import type { HttpMethod, HttpResponse, HttpTransport } from './http-transport.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import type { PulseRuleCache } from './rule-cache.js';
import { pulseSign } from './signer.js';
import { describeIssues } from './validate.js';
import { systemClock, unixSeconds } from './timing.js';
import type { Clock } from './timing.js';

// ── Types ──────────────────────────────────────────────────────────

export interface PulseClientOptions {
  auth: AuthContext;
  rules: PulseRuleCache;
  transport?: HttpTransport;
  clock?: Clock;
  logger?: PulseLogger;
}

export interface PulseResponse {
  status: number;
  headers: Readonly<Record<string, string>>;
  body: string;
  /** Body parsed as JSON. */
  json(): unknown;
  /** Body parsed as JSON and validated against `schema`. */
  parse<T>(schema: z.ZodType<T>): T;
}

export type ConditionalResult =
  | { modified: false }
  | { modified: true; response: PulseResponse; lastModified: Date | null };

interface SendOptions {
  body?: unknown;
  headers?: Record<string, string>;
  /** Statuses that are returned instead of raised. */
  allow?: readonly number[];
}

// ── Helpers ────────────────────────────────────────────────────────

function toPulseResponse(method: HttpMethod, url: string, raw: HttpResponse): PulseResponse {
  const json = (): unknown => {
    try {
      return JSON.parse(raw.body);
    } catch (err: unknown) {
      throw PulseError.requestFailed(`${method} ${url} returned a body that is not JSON`, raw.status, err);
    }
  };

  return {
    status: raw.status,
    headers: raw.headers,
    body: raw.body,
    json,
    parse<T>(schema: z.ZodType<T>): T {
      const result = schema.safeParse(json());
      if (!result.success) {
        throw PulseError.requestFailed(
          `${method} ${url} returned an unexpected body: ${describeIssues(result.error)}`,
          raw.status,
        );
      }
      return result.data;
    },
  };
}

function parseHttpDate(value: string | undefined): Date | null {
  if (value === undefined) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

// ── Client ─────────────────────────────────────────────────────────

/**
 * HTTP client that signs every request and carries the account's cookies.
 *
 * Each call takes one snapshot of the auth context before signing; a
 * concurrent `setAuth()` never mixes two contexts in a single request.
 */
export class PulseClient {
  private readonly _auth: PulseAuthHolder;
  private readonly _rules: PulseRuleCache;
  private readonly _transport: HttpTransport;
  private readonly _clock: Clock;
  private readonly _logger: PulseLogger;

  constructor(options: PulseClientOptions) {
    this._auth = new PulseAuthHolder(options.auth);
    this._rules = options.rules;
    this._transport = options.transport ?? new PulseFetchTransport();
    this._clock = options.clock ?? systemClock;
    this._logger = options.logger ?? getLogger().child({ component: 'client' });
  }

  get auth(): AuthContext {
    return this._auth.snapshot();
  }

  /** Re-authenticate. Requests already signing keep their old context. */
  setAuth(next: AuthContext): void {
    this._auth.replace(next);
    this._logger.info('Authentication context replaced', { subjectId: next.subjectId });
  }

  get(url: string): Promise<PulseResponse> {
    return this._send('GET', url);
  }

  /**
   * Conditional GET. A 304 is reported as `{ modified: false }`.
   */
  async getIfModifiedSince(url: string, since: Date): Promise<ConditionalResult> {
    const response = await this._send('GET', url, {
      headers: { [HEADER_IF_MODIFIED_SINCE]: since.toUTCString() },
      allow: [304],
    });
    if (response.status === 304) {
      return { modified: false };
    }
    return {
      modified: true,
      response,
      lastModified: parseHttpDate(response.headers[HEADER_LAST_MODIFIED]),
    };
  }

  post(url: string, body?: unknown): Promise<PulseResponse> {
    return this._send('POST', url, { body });
  }

  put(url: string, body?: unknown): Promise<PulseResponse> {
    return this._send('PUT', url, { body });
  }

  delete(url: string): Promise<PulseResponse> {
    return this._send('DELETE', url);
  }

  private async _send(method: HttpMethod, url: string, options: SendOptions = {}): Promise<PulseResponse> {
    const auth = this._auth.snapshot();
    const rules = await this._rules.get();
    const signed = pulseSign(rules, auth, url, unixSeconds(this._clock));

    const headers: Record<string, string> = { ...options.headers, ...signed };
    const cookie = await auth.cookieJar.getCookieString(url);
    if (cookie.length > 0) {
      headers[HEADER_COOKIE] = cookie;
    }

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers[HEADER_CONTENT_TYPE] = 'application/json';
    }

    this._logger.trace('Sending request', { method, url });
    let raw: HttpResponse;
    try {
      raw = await this._transport.send({ method, url, headers, body });
    } catch (err: unknown) {
      if (err instanceof PulseError) throw err;
      throw PulseError.requestFailed(`${method} ${url} failed: ${errorMessage(err)}`, undefined, err);
    }

    for (const setCookie of raw.setCookie) {
      await auth.cookieJar.setCookie(setCookie, url, { ignoreError: true });
    }

    if (!isSuccessStatus(raw.status) && !(options.allow ?? []).includes(raw.status)) {
      this._logger.error('Request rejected', { method, url, status: raw.status, body: raw.body });
      throw PulseError.requestFailed(`${method} ${url} returned status ${raw.status}`, raw.status);
    }

    return toPulseResponse(method, url, raw);
  }
}
