import WebSocket from 'ws';
import { DEFAULT_CONNECT_TIMEOUT_MS, SOCKET_CLOSE_GRACE_MS } from './constants.js';
import { PulseError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import type { InboundFrame } from './messages.js';

// ── Types ──────────────────────────────────────────────────────────

/**
 * The part of a `ws` WebSocket the session uses. Declared structurally so a
 * test double can stand in for a real socket.
 */
export interface WebSocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

/** Write half of a session transport. */
export interface FrameSink {
  send(text: string): Promise<void>;
  /** Close the transport. Resolves once the socket is closed; never rejects. */
  close(): Promise<void>;
}

/** Read half of a session transport. */
export interface FrameSource {
  /**
   * Next frame, or `null` once the transport closed cleanly.
   * Rejects with TRANSPORT_ERROR when the socket failed.
   */
  next(): Promise<InboundFrame | null>;
}

export interface SocketChannel {
  sink: FrameSink;
  source: FrameSource;
}

export interface OpenWebSocketOptions {
  connectTimeoutMs?: number;
  headers?: Record<string, string>;
  logger?: PulseLogger;
}

/** Opens a transport to `url`; swapped out in tests. */
export type SocketOpener = (url: string, options: OpenWebSocketOptions) => Promise<SocketChannel>;

// ── Frame queue ────────────────────────────────────────────────────

interface Waiter {
  resolve(frame: InboundFrame | null): void;
  reject(err: PulseError): void;
}

/**
 * Buffer between socket events and a single reader. Frames queued before an
 * end or a failure are still handed out first.
 */
export class PulseFrameQueue implements FrameSource {
  private readonly _frames: InboundFrame[] = [];
  private readonly _waiters: Waiter[] = [];
  private _ended = false;
  private _error: PulseError | null = null;

  push(frame: InboundFrame): void {
    if (this._ended) return;
    const waiter = this._waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this._frames.push(frame);
    }
  }

  /** Clean end of stream. */
  end(): void {
    if (this._ended) return;
    this._ended = true;
    for (const waiter of this._waiters.splice(0)) {
      waiter.resolve(null);
    }
  }

  fail(error: PulseError): void {
    if (this._ended) return;
    this._ended = true;
    this._error = error;
    for (const waiter of this._waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  get ended(): boolean {
    return this._ended;
  }

  next(): Promise<InboundFrame | null> {
    const frame = this._frames.shift();
    if (frame) return Promise.resolve(frame);
    if (this._error) return Promise.reject(this._error);
    if (this._ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this._waiters.push({ resolve, reject });
    });
  }
}

// ── Wrapping ───────────────────────────────────────────────────────

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function toFrame(data: WebSocket.RawData, isBinary: boolean): InboundFrame {
  const bytes = toBytes(data);
  if (isBinary) return { type: 'binary', data: bytes };
  return { type: 'text', data: Buffer.from(bytes).toString('utf8') };
}

const WS_CLOSED = 3;
const WS_NORMAL_CLOSURE = 1000;

/**
 * Split an open socket into a sink and a source.
 */
export function pulseWrapSocket(socket: WebSocketLike, logger?: PulseLogger): SocketChannel {
  const log = logger ?? getLogger().child({ component: 'socket' });
  const queue = new PulseFrameQueue();
  const closeWaiters: Array<() => void> = [];
  let closed = socket.readyState === WS_CLOSED;

  socket.on('message', (data, isBinary) => {
    queue.push(toFrame(data, isBinary));
  });
  socket.on('error', (err) => {
    log.warn('Socket error', { reason: err.message });
    queue.fail(PulseError.transportError(`Socket error: ${err.message}`, err));
  });
  socket.on('close', (code, reason) => {
    closed = true;
    log.debug('Socket closed', { code, reason: reason.toString('utf8') });
    queue.end();
    for (const resolve of closeWaiters.splice(0)) resolve();
  });

  const sink: FrameSink = {
    send(text: string): Promise<void> {
      if (closed || queue.ended) {
        return Promise.reject(PulseError.transportError('Socket is closed'));
      }
      return new Promise((resolve, reject) => {
        socket.send(text, (err) => {
          if (err) {
            reject(PulseError.transportError(`Send failed: ${err.message}`, err));
          } else {
            resolve();
          }
        });
      });
    },

    close(): Promise<void> {
      if (closed) return Promise.resolve();
      return new Promise<void>((resolve) => {
        const grace = setTimeout(() => {
          log.debug('Socket did not close in time, terminating');
          socket.terminate();
          closed = true;
          queue.end();
          resolve();
        }, SOCKET_CLOSE_GRACE_MS);
        closeWaiters.push(() => {
          clearTimeout(grace);
          resolve();
        });
        try {
          socket.close(WS_NORMAL_CLOSURE);
        } catch (err: unknown) {
          log.debug('Socket close raised, terminating', { reason: errorMessage(err) });
          socket.terminate();
        }
      });
    },
  };

  return { sink, source: queue };
}

// ── Opening ────────────────────────────────────────────────────────

/**
 * Open a `ws` WebSocket and wrap it. The opening handshake is bounded by
 * `connectTimeoutMs`.
 *
 * @throws PulseError(TRANSPORT_ERROR)
 */
export async function pulseOpenWebSocket(
  url: string,
  options: OpenWebSocketOptions = {},
): Promise<SocketChannel> {
  const log = options.logger ?? getLogger().child({ component: 'socket' });
  const socket = new WebSocket(url, {
    handshakeTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    headers: options.headers,
  });

  await new Promise<void>((resolve, reject) => {
    const onOpen = (): void => {
      socket.off('error', onError);
      resolve();
    };
    const onError = (err: Error): void => {
      socket.off('open', onOpen);
      reject(PulseError.transportError(`Cannot open ${url}: ${err.message}`, err));
    };
    socket.once('open', onOpen);
    socket.once('error', onError);
  });

  log.debug('Socket opened', { url });
  return pulseWrapSocket(socket, log);
}
