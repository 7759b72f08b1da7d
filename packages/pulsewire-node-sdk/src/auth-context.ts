import { CookieJar } from 'tough-cookie';
import type { SigningSubject } from './signer.js';

// ── Types ──────────────────────────────────────────────────────────

/**
 * Credentials a client signs and sends with. Replaced wholesale on
 * re-authentication; the jar itself is shared by every in-flight request.
 */
export interface AuthContext extends SigningSubject {
  readonly cookieJar: CookieJar;
}

export interface AuthContextInit {
  subjectId: string;
  clientId: string;
  userAgent: string;
  cookieJar?: CookieJar;
}

// ── Factory ────────────────────────────────────────────────────────

export function pulseCreateAuthContext(init: AuthContextInit): AuthContext {
  return Object.freeze({
    subjectId: init.subjectId,
    clientId: init.clientId,
    userAgent: init.userAgent,
    cookieJar: init.cookieJar ?? new CookieJar(),
  });
}

// ── Holder ─────────────────────────────────────────────────────────

/**
 * Holds the current context. `snapshot()` is taken once per request; a
 * `replace()` only affects requests that snapshot afterwards.
 */
export class PulseAuthHolder {
  private _current: AuthContext;

  constructor(initial: AuthContext) {
    this._current = initial;
  }

  snapshot(): AuthContext {
    return this._current;
  }

  replace(next: AuthContext): void {
    this._current = next;
  }
}
