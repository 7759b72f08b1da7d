import { DEFAULT_REQUEST_TIMEOUT_MS } from './constants.js';
import { PulseError, errorMessage } from './errors.js';

// ── Types ──────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/** Fully buffered response. Header names are lowercase. */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  /** Every `set-cookie` header, unjoined. */
  setCookie: string[];
  body: string;
}

/**
 * Anything able to perform one HTTP exchange. Implementations reject only
 * when no response was received; a non-2xx status is still a response.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface PulseFetchTransportOptions {
  timeoutMs?: number;
}

// ── Implementation ─────────────────────────────────────────────────

/**
 * HttpTransport over Node's global fetch.
 */
export class PulseFetchTransport implements HttpTransport {
  private readonly _timeoutMs: number;

  constructor(options?: PulseFetchTransportOptions) {
    this._timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this._timeoutMs),
      });
    } catch (err: unknown) {
      throw PulseError.requestFailed(
        `${request.method} ${request.url} failed: ${errorMessage(err)}`,
        undefined,
        err,
      );
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers,
      setCookie: response.headers.getSetCookie(),
      body: await response.text(),
    };
  }
}

/** 2xx check shared by every caller. */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
