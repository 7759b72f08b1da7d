// ── Clock ──────────────────────────────────────────────────────────

/** Source of wall-clock time in milliseconds since the Unix epoch. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Whole Unix seconds for a clock reading. */
export function unixSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}

// ── Bounded waits ──────────────────────────────────────────────────

/**
 * Sleep for `ms`, resolving `true` when the time elapsed and `false` when
 * `signal` aborted first. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type Bounded<T> = { kind: 'value'; value: T } | { kind: 'timeout' };

/**
 * Race `promise` against a timer. The timer is always cleared; a rejection of
 * `promise` before the deadline propagates.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<Bounded<T>> {
  return new Promise<Bounded<T>>((resolve, reject) => {
    const timer = setTimeout(() => resolve({ kind: 'timeout' }), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve({ kind: 'value', value });
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Wait for `promise` unless `signal` aborts first. Resolves `true` once the
 * promise fulfilled and `false` on abort; a rejection before the abort
 * propagates.
 */
export function settledUnlessAborted(promise: Promise<unknown>, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise<boolean>((resolve, reject) => {
    const onAbort = (): void => resolve(false);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve(true);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

// ── Deferred ───────────────────────────────────────────────────────

/** A promise resolved from outside its executor. Resolving twice is a no-op. */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private _resolve: (value: T) => void = () => undefined;
  private _settled = false;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this._resolve = resolve;
    });
  }

  get settled(): boolean {
    return this._settled;
  }

  resolve(value: T): void {
    if (this._settled) return;
    this._settled = true;
    this._resolve(value);
  }
}
