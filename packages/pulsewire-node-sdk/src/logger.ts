/**
 * Structured logging for the SDK.
 *
 * Thin wrapper over pino so components log `(message, data)` pairs and can be
 * handed a child logger carrying their component name.
 */
import pino from 'pino';

// ── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Where log lines go; stdout when omitted. */
  destination?: pino.DestinationStream;
}

export type LogContext = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.PULSE_LOG_LEVEL;
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

// ── Logger ─────────────────────────────────────────────────────────

export class PulseLogger {
  private readonly _pino: pino.Logger;

  constructor(instance: pino.Logger) {
    this._pino = instance;
  }

  /**
   * Create a child logger with additional bound context.
   */
  child(context: LogContext): PulseLogger {
    return new PulseLogger(this._pino.child(context));
  }

  get level(): string {
    return this._pino.level;
  }

  trace(msg: string, data?: LogContext): void {
    this._pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: LogContext): void {
    this._pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: LogContext): void {
    this._pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: LogContext): void {
    this._pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: Error | LogContext): void {
    if (error instanceof Error) {
      this._pino.error({ err: error }, msg);
    } else {
      this._pino.error(error ?? {}, msg);
    }
  }
}

/**
 * Create a configured logger.
 */
export function createLogger(options: LoggerOptions = {}): PulseLogger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? levelFromEnv(),
    name: options.name ?? 'pulsewire',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  const instance = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
  return new PulseLogger(instance);
}

// ── Process default ────────────────────────────────────────────────

let defaultLogger: PulseLogger | null = null;

/**
 * Get the process-wide default logger, creating it on first use.
 */
export function getLogger(): PulseLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

/**
 * Replace the process-wide default logger.
 */
export function setLogger(logger: PulseLogger): void {
  defaultLogger = logger;
}
