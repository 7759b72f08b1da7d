// ── Types ──────────────────────────────────────────────────────────

export type AckOutcome = 'acked' | 'timeout' | 'aborted';

// ── Implementation ─────────────────────────────────────────────────

/**
 * Level-triggered acknowledgement between the decoder (which sees liveness
 * acks) and the heartbeat (which waits for them).
 *
 * `notify()` leaves at most one pending permit, so a burst of acks counts
 * once. One waiter at a time.
 */
export class PulseAckSignal {
  private _pending = false;
  private _waiter: (() => void) | null = null;

  notify(): void {
    const waiter = this._waiter;
    if (waiter) {
      waiter();
      return;
    }
    this._pending = true;
  }

  /** Drop a permit left over from an earlier ping. */
  clear(): void {
    this._pending = false;
  }

  get pending(): boolean {
    return this._pending;
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<AckOutcome> {
    if (signal?.aborted) return Promise.resolve('aborted');
    if (this._pending) {
      this._pending = false;
      return Promise.resolve('acked');
    }

    return new Promise<AckOutcome>((resolve) => {
      const finish = (outcome: AckOutcome): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this._waiter === waiter) this._waiter = null;
        resolve(outcome);
      };
      const onAbort = (): void => finish('aborted');
      const waiter = (): void => finish('acked');
      const timer = setTimeout(() => finish('timeout'), Math.max(0, timeoutMs));

      signal?.addEventListener('abort', onAbort, { once: true });
      this._waiter = waiter;
    });
  }
}
