// ── Constants ────────────────────────────────────────────────────────
export {
  PULSE_SDK_VERSION,
  SHA1_HEX_LENGTH,
  SIGN_FIELD_DELIMITER,
  SIGN_PART_DELIMITER,
  ACCEPT_HEADER_VALUE,
  MAX_TIMESTAMP,
  DEFAULT_RULES_TTL_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_PERIOD_MS,
  DEFAULT_HEARTBEAT_ACK_TIMEOUT_MS,
  SOCKET_CLOSE_GRACE_MS,
} from './constants.js';

// ── Errors ───────────────────────────────────────────────────────────
export { PulseError, PulseErrorCode } from './errors.js';
export type { PulseErrorOptions } from './errors.js';

// ── Logging ──────────────────────────────────────────────────────────
export { PulseLogger, createLogger, getLogger, setLogger } from './logger.js';
export type { LogLevel, LoggerOptions, LogContext } from './logger.js';

// ── Time ─────────────────────────────────────────────────────────────
export { systemClock } from './timing.js';
export type { Clock } from './timing.js';

// ── Validation ───────────────────────────────────────────────────────
export {
  pulseValidateTimestamp,
  pulseParseTimestamp,
  pulseValidateDigest,
} from './validate.js';

// ── Hashing ──────────────────────────────────────────────────────────
export { pulseSha1Hex } from './hash.js';

// ── Headers ──────────────────────────────────────────────────────────
export {
  HEADER_ACCEPT,
  HEADER_USER_AGENT,
  HEADER_CLIENT_ID,
  HEADER_SUBJECT_ID,
  HEADER_TIME,
  HEADER_APP_TOKEN,
  HEADER_SIGN,
  pulseGetHeader,
} from './headers.js';
export type { SignedHeaderSet } from './headers.js';

// ── Rules ────────────────────────────────────────────────────────────
export { pulseParseRules, PulseHttpRuleSource } from './rules.js';
export type { DynamicRules, RuleSource, PulseHttpRuleSourceOptions } from './rules.js';
export { PulseRuleCache } from './rule-cache.js';
export type { PulseRuleCacheOptions } from './rule-cache.js';

// ── Signing ──────────────────────────────────────────────────────────
export {
  pulseBuildSignPath,
  pulseComputeChecksum,
  pulseBuildSignature,
  pulseComposeSignMessage,
  pulseJoinSign,
  pulseSign,
} from './signer.js';
export type { SigningSubject, SignatureParts } from './signer.js';

// ── HTTP ─────────────────────────────────────────────────────────────
export { PulseFetchTransport } from './http-transport.js';
export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './http-transport.js';
export { pulseCreateAuthContext } from './auth-context.js';
export type { AuthContext, AuthContextInit } from './auth-context.js';
export { PulseClient } from './client.js';
export type { PulseClientOptions, PulseResponse, ConditionalResult } from './client.js';

// ── Session frames ───────────────────────────────────────────────────
export {
  APPLICATION_TAGS,
  pulseEncodeConnect,
  pulseEncodeHeartbeat,
  pulseDecodeFrame,
} from './messages.js';
export type {
  InboundFrame,
  InboundMessage,
  ApplicationMessage,
  ApplicationTag,
  ShapedTag,
  DecodeResult,
} from './messages.js';

// ── Session transport ────────────────────────────────────────────────
export { PulseFrameQueue, pulseWrapSocket, pulseOpenWebSocket } from './socket-transport.js';
export type {
  WebSocketLike,
  FrameSink,
  FrameSource,
  SocketChannel,
  SocketOpener,
  OpenWebSocketOptions,
} from './socket-transport.js';

// ── Session ──────────────────────────────────────────────────────────
export { PulseAckSignal } from './ack-signal.js';
export type { AckOutcome } from './ack-signal.js';
export { PulseHeartbeatMonitor } from './heartbeat.js';
export type { HeartbeatTiming } from './heartbeat.js';
export { PulseMessageDecoder } from './decoder.js';
export type { SessionMessage, MessageHandler } from './decoder.js';
export { PulseSession } from './session.js';
export type { SessionState, TerminationReason, PulseSessionOptions } from './session.js';
export { pulseConnect } from './connector.js';
export type { ConnectOptions, SessionConnector } from './connector.js';

// ── Supervisor ───────────────────────────────────────────────────────
export { PulseSessionSupervisor, pulseFetchProfile } from './supervisor.js';
export type { AccountProfile, DisconnectOutcome } from './supervisor.js';

// ── Configuration ────────────────────────────────────────────────────
export { pulseLoadConfig, pulseLoadAuth } from './config.js';
export type { PulseConfig } from './config.js';

// ── Debug Trace ──────────────────────────────────────────────────────
export { pulseSignDebug, pulseFormatTrace } from './debug.js';
export type { TraceStep, SignDebugInput, SignDebugResult } from './debug.js';
