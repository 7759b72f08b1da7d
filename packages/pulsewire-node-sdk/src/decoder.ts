import type { PulseAckSignal } from './ack-signal.js';
import { PulseError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import { pulseDecodeFrame } from './messages.js';
import type { InboundFrame, InboundMessage } from './messages.js';
import type { FrameSource } from './socket-transport.js';
import { settledUnlessAborted } from './timing.js';

// ── Types ──────────────────────────────────────────────────────────

/** Every inbound message except liveness acks, which the decoder consumes. */
export type SessionMessage = Exclude<InboundMessage, { kind: 'onlines' }>;

/** Consumer of decoded messages. A returned promise is awaited before the next read. */
export type MessageHandler = (message: SessionMessage) => void | Promise<void>;

/** How a decoder run ended without failing. */
export type DecoderEnd = 'remote-closed' | 'aborted';

export interface PulseMessageDecoderOptions {
  source: FrameSource;
  ack: PulseAckSignal;
  onMessage: MessageHandler;
  logger?: PulseLogger;
}

// ── Implementation ─────────────────────────────────────────────────

/**
 * Reads frames in arrival order. Undecodable frames are logged and skipped;
 * liveness acks wake the heartbeat; everything else goes to the consumer.
 */
export class PulseMessageDecoder {
  private readonly _source: FrameSource;
  private readonly _ack: PulseAckSignal;
  private readonly _onMessage: MessageHandler;
  private readonly _logger: PulseLogger;
  private _dropped = 0;
  private _delivered = 0;

  constructor(options: PulseMessageDecoderOptions) {
    this._source = options.source;
    this._ack = options.ack;
    this._onMessage = options.onMessage;
    this._logger = options.logger ?? getLogger().child({ component: 'decoder' });
  }

  get dropped(): number {
    return this._dropped;
  }

  get delivered(): number {
    return this._delivered;
  }

  /**
   * Read until the stream ends or `signal` aborts. An abort also ends a wait
   * on a pending consumer. Rejects with TRANSPORT_ERROR when reading fails.
   */
  async run(signal: AbortSignal): Promise<DecoderEnd> {
    while (!signal.aborted) {
      let frame: InboundFrame | null;
      try {
        frame = await this._source.next();
      } catch (err: unknown) {
        if (signal.aborted) return 'aborted';
        if (err instanceof PulseError) throw err;
        throw PulseError.transportError(`Read failed: ${errorMessage(err)}`, err);
      }

      if (signal.aborted) return 'aborted';
      if (frame === null) {
        this._logger.info('Stream closed by remote');
        return 'remote-closed';
      }

      const result = pulseDecodeFrame(frame);
      if (!result.ok) {
        this._dropped++;
        this._logger.warn('Dropping undecodable frame', { reason: result.error.message });
        continue;
      }

      const message = result.message;
      if (message.kind === 'onlines') {
        this._ack.notify();
        continue;
      }

      this._delivered++;
      if (!(await settledUnlessAborted(Promise.resolve(this._onMessage(message)), signal))) {
        return 'aborted';
      }
    }
    return 'aborted';
  }
}
