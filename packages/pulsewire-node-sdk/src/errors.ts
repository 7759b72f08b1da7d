/**
 * Error codes for every failure the SDK surfaces.
 * One code per failure class; only DECODE_ERROR is recoverable.
 */
export enum PulseErrorCode {
  RULE_FETCH_FAILED = 'PULSE_RULE_FETCH_FAILED',
  RULES_MALFORMED = 'PULSE_RULES_MALFORMED',
  SIGNING_FAILED = 'PULSE_SIGNING_FAILED',
  REQUEST_FAILED = 'PULSE_REQUEST_FAILED',
  HANDSHAKE_TIMEOUT = 'PULSE_HANDSHAKE_TIMEOUT',
  HANDSHAKE_PROTOCOL = 'PULSE_HANDSHAKE_PROTOCOL',
  HEARTBEAT_TIMEOUT = 'PULSE_HEARTBEAT_TIMEOUT',
  TRANSPORT_ERROR = 'PULSE_TRANSPORT_ERROR',
  DECODE_ERROR = 'PULSE_DECODE_ERROR',
  CONFIG_INVALID = 'PULSE_CONFIG_INVALID',
}

/** Retryable error codes (transient conditions). */
const RETRYABLE_CODES = new Set([
  PulseErrorCode.RULE_FETCH_FAILED,
  PulseErrorCode.REQUEST_FAILED,
  PulseErrorCode.HANDSHAKE_TIMEOUT,
  PulseErrorCode.HEARTBEAT_TIMEOUT,
  PulseErrorCode.TRANSPORT_ERROR,
]);

export interface PulseErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * Structured error type for SDK operations.
 * Messages are safe for logging: they never carry secrets or cookie values.
 */
export class PulseError extends Error {
  readonly code: PulseErrorCode;
  readonly retryable: boolean;
  readonly fatal: boolean;
  /** HTTP status of the response that caused the error, when there was one. */
  readonly status: number | undefined;

  constructor(code: PulseErrorCode, message: string, options?: PulseErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PulseError';
    this.code = code;
    this.retryable = RETRYABLE_CODES.has(code);
    this.fatal = code !== PulseErrorCode.DECODE_ERROR;
    this.status = options?.status;
  }

  // ── Convenience factories ──────────────────────────────────────────

  static ruleFetchFailed(message: string, cause?: unknown): PulseError {
    return new PulseError(PulseErrorCode.RULE_FETCH_FAILED, message, { cause });
  }

  static rulesMalformed(message: string): PulseError {
    return new PulseError(PulseErrorCode.RULES_MALFORMED, message);
  }

  static signingFailed(message: string): PulseError {
    return new PulseError(PulseErrorCode.SIGNING_FAILED, message);
  }

  static requestFailed(message: string, status?: number, cause?: unknown): PulseError {
    return new PulseError(PulseErrorCode.REQUEST_FAILED, message, { status, cause });
  }

  static handshakeTimeout(timeoutMs: number): PulseError {
    return new PulseError(
      PulseErrorCode.HANDSHAKE_TIMEOUT,
      `No handshake acknowledgement within ${timeoutMs}ms`,
    );
  }

  static handshakeProtocol(message: string): PulseError {
    return new PulseError(PulseErrorCode.HANDSHAKE_PROTOCOL, message);
  }

  static heartbeatTimeout(timeoutMs: number): PulseError {
    return new PulseError(
      PulseErrorCode.HEARTBEAT_TIMEOUT,
      `Heartbeat not acknowledged within ${timeoutMs}ms`,
    );
  }

  static transportError(message: string, cause?: unknown): PulseError {
    return new PulseError(PulseErrorCode.TRANSPORT_ERROR, message, { cause });
  }

  static decodeError(message: string, cause?: unknown): PulseError {
    return new PulseError(PulseErrorCode.DECODE_ERROR, message, { cause });
  }

  static configInvalid(message: string, cause?: unknown): PulseError {
    return new PulseError(PulseErrorCode.CONFIG_INVALID, message, { cause });
  }
}

/** Human-readable message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
