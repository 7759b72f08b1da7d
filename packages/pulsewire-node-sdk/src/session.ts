import { PulseAckSignal } from './ack-signal.js';
import { DEFAULT_CONNECT_TIMEOUT_MS } from './constants.js';
import { PulseMessageDecoder } from './decoder.js';
import type { MessageHandler, SessionMessage } from './decoder.js';
import { PulseError, errorMessage } from './errors.js';
import { pulseHandshake } from './handshake.js';
import { PulseHeartbeatMonitor, pulseResolveHeartbeatTiming } from './heartbeat.js';
import type { HeartbeatTiming } from './heartbeat.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import { pulseOpenWebSocket } from './socket-transport.js';
import type { SocketChannel, SocketOpener } from './socket-transport.js';
import { Deferred, systemClock } from './timing.js';
import type { Clock } from './timing.js';

// ── Types ──────────────────────────────────────────────────────────

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'terminated';

export type TerminationReason =
  | { kind: 'closed' }
  | { kind: 'remote-closed' }
  | { kind: 'error'; error: PulseError };

export type TerminationListener = (reason: TerminationReason) => void;

export interface SessionTiming extends HeartbeatTiming {
  connectTimeoutMs?: number;
}

export interface PulseSessionOptions extends SessionTiming {
  url: string;
  token: string;
  /** Extra headers for the WebSocket upgrade request. */
  headers?: Record<string, string>;
  open?: SocketOpener;
  clock?: Clock;
  logger?: PulseLogger;
  /**
   * Subscribed before the decoder starts, so frames that arrive right
   * behind the handshake acknowledgement are not missed.
   */
  onMessage?: MessageHandler;
  onTerminated?: TerminationListener;
}

function toPulseError(err: unknown): PulseError {
  return err instanceof PulseError
    ? err
    : PulseError.transportError(errorMessage(err), err);
}

// ── Session ────────────────────────────────────────────────────────

/**
 * One real-time session.
 *
 *   disconnected → connecting → connected → terminated
 *
 * While connected, a heartbeat and a decoder run side by side. Whichever
 * of them fails first terminates the session; the other is stopped. There
 * is no way out of `terminated`; reconnecting means a new session.
 */
export class PulseSession {
  private readonly _url: string;
  private readonly _token: string;
  private readonly _headers: Record<string, string> | undefined;
  private readonly _connectTimeoutMs: number;
  private readonly _timing: Required<HeartbeatTiming>;
  private readonly _open: SocketOpener;
  private readonly _clock: Clock;
  private readonly _logger: PulseLogger;

  private readonly _abort = new AbortController();
  private readonly _done = new Deferred<TerminationReason>();
  private readonly _messageListeners = new Set<MessageHandler>();
  private readonly _terminationListeners = new Set<TerminationListener>();

  private _state: SessionState = 'disconnected';
  private _channel: SocketChannel | null = null;
  private _reason: TerminationReason | null = null;
  private _units: Promise<unknown> = Promise.resolve();
  private _shutdown: Promise<void> = Promise.resolve();

  constructor(options: PulseSessionOptions) {
    this._timing = pulseResolveHeartbeatTiming(options);
    this._url = options.url;
    this._token = options.token;
    this._headers = options.headers;
    this._connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this._open = options.open ?? pulseOpenWebSocket;
    this._clock = options.clock ?? systemClock;
    this._logger = options.logger ?? getLogger().child({ component: 'session' });
    if (options.onMessage) this._messageListeners.add(options.onMessage);
    if (options.onTerminated) this._terminationListeners.add(options.onTerminated);
  }

  get state(): SessionState {
    return this._state;
  }

  /** Resolves with the termination reason once the session is fully stopped. */
  get terminated(): Promise<TerminationReason> {
    return this._done.promise;
  }

  /** Termination reason, or null while the session is live. */
  get reason(): TerminationReason | null {
    return this._reason;
  }

  /**
   * Subscribe to application and control messages, in arrival order. A
   * returned promise holds back the next read until it settles.
   *
   * Frames can arrive together with the handshake acknowledgement; pass
   * `onMessage` in the options to see those as well.
   */
  onMessage(listener: MessageHandler): () => void {
    this._messageListeners.add(listener);
    return () => {
      this._messageListeners.delete(listener);
    };
  }

  /**
   * Subscribe to termination. Each listener runs at most once; one added
   * after termination runs on the next microtask.
   */
  onTerminated(listener: TerminationListener): () => void {
    const reason = this._reason;
    if (reason && this._done.settled) {
      queueMicrotask(() => this._notifyTerminated(listener, reason));
      return () => undefined;
    }
    this._terminationListeners.add(listener);
    return () => {
      this._terminationListeners.delete(listener);
    };
  }

  /**
   * Open the transport, authenticate and start the heartbeat and decoder.
   *
   * @throws PulseError(HANDSHAKE_TIMEOUT | HANDSHAKE_PROTOCOL | TRANSPORT_ERROR)
   */
  async connect(): Promise<void> {
    if (this._state !== 'disconnected') {
      throw new Error(`Cannot connect a session in state ${this._state}`);
    }
    this._state = 'connecting';
    this._logger.debug('Connecting', { url: this._url });

    let channel: SocketChannel;
    try {
      channel = await this._open(this._url, {
        connectTimeoutMs: this._connectTimeoutMs,
        headers: this._headers,
        logger: this._logger,
      });
    } catch (err: unknown) {
      const error = toPulseError(err);
      this._terminate({ kind: 'error', error });
      throw error;
    }

    if (this._reason) {
      await channel.sink.close();
      throw PulseError.transportError('Session was closed while connecting');
    }
    this._channel = channel;

    try {
      await pulseHandshake(channel, this._token, {
        timeoutMs: this._connectTimeoutMs,
        logger: this._logger,
      });
    } catch (err: unknown) {
      const error = toPulseError(err);
      this._terminate({ kind: 'error', error });
      throw error;
    }

    if (this._reason) {
      throw PulseError.transportError('Session was closed while connecting');
    }

    this._state = 'connected';
    this._logger.info('Session connected', { url: this._url });
    this._startUnits(channel);
  }

  /**
   * Stop the session and wait until the heartbeat, the decoder and the
   * socket have all stopped. Resolves with the termination reason, which is
   * `closed` unless the session had already ended for another reason.
   */
  async close(): Promise<TerminationReason> {
    this._terminate({ kind: 'closed' });
    await this._shutdown;
    return this._done.promise;
  }

  // ── Internals ─────────────────────────────────────────────────────

  private _startUnits(channel: SocketChannel): void {
    const ack = new PulseAckSignal();
    const signal = this._abort.signal;

    const heartbeat = new PulseHeartbeatMonitor({
      sink: channel.sink,
      ack,
      periodMs: this._timing.periodMs,
      ackTimeoutMs: this._timing.ackTimeoutMs,
      clock: this._clock,
      logger: this._logger.child({ unit: 'heartbeat' }),
    });
    const decoder = new PulseMessageDecoder({
      source: channel.source,
      ack,
      onMessage: (message) => this._deliver(message),
      logger: this._logger.child({ unit: 'decoder' }),
    });

    this._units = Promise.all([
      heartbeat.run(signal).then(
        () => undefined,
        (err: unknown) => this._terminate({ kind: 'error', error: toPulseError(err) }),
      ),
      decoder.run(signal).then(
        (end) => {
          if (end === 'remote-closed') this._terminate({ kind: 'remote-closed' });
        },
        (err: unknown) => this._terminate({ kind: 'error', error: toPulseError(err) }),
      ),
    ]);
  }

  private async _deliver(message: SessionMessage): Promise<void> {
    for (const listener of [...this._messageListeners]) {
      try {
        await listener(message);
      } catch (err: unknown) {
        this._logger.error('Message listener failed', { reason: errorMessage(err) });
      }
    }
  }

  private _terminate(reason: TerminationReason): void {
    if (this._reason) return;
    this._reason = reason;
    this._state = 'terminated';
    this._abort.abort();

    if (reason.kind === 'error') {
      this._logger.warn('Session terminated', { reason: reason.kind, code: reason.error.code, error: reason.error.message });
    } else {
      this._logger.info('Session terminated', { reason: reason.kind });
    }

    this._shutdown = this._finish(reason);
  }

  private async _finish(reason: TerminationReason): Promise<void> {
    const channel = this._channel;
    if (channel) await channel.sink.close();
    await this._units;

    this._done.resolve(reason);
    const listeners = [...this._terminationListeners];
    this._terminationListeners.clear();
    for (const listener of listeners) {
      this._notifyTerminated(listener, reason);
    }
  }

  private _notifyTerminated(listener: TerminationListener, reason: TerminationReason): void {
    try {
      listener(reason);
    } catch (err: unknown) {
      this._logger.error('Termination listener failed', { reason: errorMessage(err) });
    }
  }
}
