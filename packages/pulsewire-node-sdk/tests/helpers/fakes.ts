import { EventEmitter } from 'node:events';
import { createLogger } from '../../src/logger.js';
import type { PulseLogger } from '../../src/logger.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../../src/http-transport.js';
import type { DynamicRules } from '../../src/rules.js';
import type { WebSocketLike } from '../../src/socket-transport.js';

// ── Logging ────────────────────────────────────────────────────────

export function silentLogger(): PulseLogger {
  return createLogger({ level: 'silent' });
}

export interface LogLine {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/** Logger whose output lines are parsed and kept in `lines`. */
export function recordingLogger(level: 'trace' | 'debug' | 'info' = 'debug'): {
  logger: PulseLogger;
  lines: LogLine[];
} {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(msg: string): void {
        const parsed: unknown = JSON.parse(msg);
        if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && 'msg' in parsed) {
          lines.push({ ...parsed, level: String(parsed.level), msg: String(parsed.msg) });
        }
      },
    },
  });
  return { logger, lines };
}

// ── Rules ──────────────────────────────────────────────────────────

export const TEST_RULES: DynamicRules = Object.freeze({
  appToken: 'test-app-token',
  staticParam: 'test-static',
  prefix: '100',
  suffix: 'abc',
  checksumConstant: 250,
  checksumIndexes: Object.freeze([0, 5, 17, 39]),
});

export const TEST_RULE_DOCUMENT = JSON.stringify({
  'app-token': 'test-app-token',
  static_param: 'test-static',
  prefix: '100',
  suffix: 'abc',
  checksum_constant: 250,
  checksum_indexes: [0, 5, 17, 39],
});

// ── HTTP ───────────────────────────────────────────────────────────

export function response(status: number, body = '', extra: Partial<HttpResponse> = {}): HttpResponse {
  return { status, headers: {}, setCookie: [], body, ...extra };
}

type Handler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * HttpTransport that answers from queued handlers, falling back to a
 * default one, and records every request.
 */
export class FakeHttpTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly _queue: Handler[] = [];
  private _fallback: Handler;

  constructor(fallback: Handler = () => response(200, '{}')) {
    this._fallback = fallback;
  }

  enqueue(handler: Handler | HttpResponse): this {
    this._queue.push(typeof handler === 'function' ? handler : () => handler);
    return this;
  }

  setFallback(handler: Handler): void {
    this._fallback = handler;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const handler = this._queue.shift() ?? this._fallback;
    return handler(request);
  }
}

// ── WebSocket ──────────────────────────────────────────────────────

/**
 * In-process stand-in for a `ws` socket. Frames the code sends land in
 * `sent`; `receive()` plays a frame from the remote side.
 */
export class FakeSocket extends EventEmitter implements WebSocketLike {
  readyState = 1;
  readonly sent: string[] = [];
  closeCalls = 0;
  terminated = false;
  /** When set, `send` reports this error. */
  sendError: Error | null = null;
  /** When false, `close()` never completes and only `terminate()` ends the socket. */
  closesCleanly = true;

  send(data: string, cb?: (err?: Error) => void): void {
    const error = this.sendError;
    if (!error) this.sent.push(data);
    queueMicrotask(() => cb?.(error ?? undefined));
  }

  close(): void {
    this.closeCalls++;
    if (this.readyState === 3 || !this.closesCleanly) return;
    this.readyState = 2;
    queueMicrotask(() => this.remoteClose(1000));
  }

  terminate(): void {
    this.terminated = true;
    this.remoteClose(1006);
  }

  receive(frame: unknown): void {
    const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
    this.emit('message', Buffer.from(text, 'utf8'), false);
  }

  receiveBinary(bytes: Uint8Array): void {
    this.emit('message', Buffer.from(bytes), true);
  }

  remoteClose(code = 1000): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.emit('close', code, Buffer.from(''));
  }

  fail(message: string): void {
    this.emit('error', new Error(message));
    this.remoteClose(1006);
  }

  /** Parsed copies of every sent frame. */
  sentFrames(): unknown[] {
    return this.sent.map((text): unknown => JSON.parse(text));
  }
}

/** Let queued microtasks and promise callbacks run. */
export async function flush(times = 5): Promise<void> {
  for (let i = 0; i < times; i++) {
    await Promise.resolve();
  }
}
