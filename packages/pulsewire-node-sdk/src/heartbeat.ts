import type { PulseAckSignal } from './ack-signal.js';
import { DEFAULT_HEARTBEAT_ACK_TIMEOUT_MS, DEFAULT_HEARTBEAT_PERIOD_MS } from './constants.js';
import { PulseError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import { pulseEncodeHeartbeat } from './messages.js';
import type { FrameSink } from './socket-transport.js';
import { sleep, systemClock } from './timing.js';
import type { Clock } from './timing.js';

// ── Types ──────────────────────────────────────────────────────────

export interface HeartbeatTiming {
  periodMs?: number;
  ackTimeoutMs?: number;
}

export interface PulseHeartbeatMonitorOptions extends HeartbeatTiming {
  sink: FrameSink;
  ack: PulseAckSignal;
  clock?: Clock;
  logger?: PulseLogger;
}

/**
 * Resolve and check heartbeat timing. The ack wait has to fit inside one
 * period.
 *
 * @throws PulseError(CONFIG_INVALID)
 */
export function pulseResolveHeartbeatTiming(timing: HeartbeatTiming): Required<HeartbeatTiming> {
  const periodMs = timing.periodMs ?? DEFAULT_HEARTBEAT_PERIOD_MS;
  const ackTimeoutMs = timing.ackTimeoutMs ?? DEFAULT_HEARTBEAT_ACK_TIMEOUT_MS;
  if (!(periodMs > 0) || !(ackTimeoutMs > 0)) {
    throw PulseError.configInvalid('Heartbeat period and ack timeout must be positive');
  }
  if (ackTimeoutMs >= periodMs) {
    throw PulseError.configInvalid(
      `Heartbeat ack timeout (${ackTimeoutMs}ms) must be shorter than the period (${periodMs}ms)`,
    );
  }
  return { periodMs, ackTimeoutMs };
}

// ── Implementation ─────────────────────────────────────────────────

/**
 * Sends a liveness ping every period and requires an acknowledgement within
 * the ack timeout. Pings start on a fixed cadence measured from the start of
 * each iteration, so a slow ack does not push later pings back.
 */
export class PulseHeartbeatMonitor {
  private readonly _sink: FrameSink;
  private readonly _ack: PulseAckSignal;
  private readonly _periodMs: number;
  private readonly _ackTimeoutMs: number;
  private readonly _clock: Clock;
  private readonly _logger: PulseLogger;
  private _pings = 0;

  constructor(options: PulseHeartbeatMonitorOptions) {
    const timing = pulseResolveHeartbeatTiming(options);
    this._sink = options.sink;
    this._ack = options.ack;
    this._periodMs = timing.periodMs;
    this._ackTimeoutMs = timing.ackTimeoutMs;
    this._clock = options.clock ?? systemClock;
    this._logger = options.logger ?? getLogger().child({ component: 'heartbeat' });
  }

  /** Pings sent so far. */
  get pings(): number {
    return this._pings;
  }

  /**
   * Run until `signal` aborts (resolves) or liveness is lost (rejects with
   * HEARTBEAT_TIMEOUT or TRANSPORT_ERROR).
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = this._clock.now();
      this._ack.clear();

      try {
        await this._sink.send(pulseEncodeHeartbeat());
      } catch (err: unknown) {
        if (signal.aborted) return;
        if (err instanceof PulseError) throw err;
        throw PulseError.transportError(`Heartbeat send failed: ${errorMessage(err)}`, err);
      }
      this._pings++;
      this._logger.trace('Heartbeat sent', { ping: this._pings });

      const outcome = await this._ack.wait(this._ackTimeoutMs, signal);
      if (outcome === 'aborted') return;
      if (outcome === 'timeout') {
        this._logger.warn('Heartbeat not acknowledged', { ackTimeoutMs: this._ackTimeoutMs });
        throw PulseError.heartbeatTimeout(this._ackTimeoutMs);
      }

      const elapsed = this._clock.now() - startedAt;
      if (!(await sleep(this._periodMs - elapsed, signal))) return;
    }
  }
}
