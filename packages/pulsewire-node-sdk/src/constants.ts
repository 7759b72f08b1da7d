// pulsewire constants: wire values shared with the remote service

/** SDK version (library version). */
export const PULSE_SDK_VERSION = '0.3.0';

// ── Signing ─────────────────────────────────────────────────────────

/** Length of a SHA-1 digest rendered as hex (20 bytes = 40 hex chars). */
export const SHA1_HEX_LENGTH = 40;

/** Separator between the fields hashed into the signature. */
export const SIGN_FIELD_DELIMITER = '\n';

/** Separator between the parts of the `sign` header value. */
export const SIGN_PART_DELIMITER = ':';

/** Value sent in the `accept` header of every signed request. */
export const ACCEPT_HEADER_VALUE = 'application/json, text/plain, */*';

/** Maximum reasonable timestamp (year 3000 in Unix time). */
export const MAX_TIMESTAMP = 32503680000;

// ── Rule cache ──────────────────────────────────────────────────────

/** Default lifetime of a fetched rule document (1 hour). */
export const DEFAULT_RULES_TTL_SECONDS = 3600;

// ── HTTP ────────────────────────────────────────────────────────────

/** Default timeout for a single HTTP exchange. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// ── Session ─────────────────────────────────────────────────────────

/** Bounded wait for the handshake acknowledgement. */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Fixed cadence of liveness pings. */
export const DEFAULT_HEARTBEAT_PERIOD_MS = 20_000;

/** Bounded wait for a ping acknowledgement; must stay below the period. */
export const DEFAULT_HEARTBEAT_ACK_TIMEOUT_MS = 5_000;

/** Grace period for a clean close before the socket is terminated. */
export const SOCKET_CLOSE_GRACE_MS = 1_000;

/** `act` of the authentication frame. */
export const ACT_CONNECT = 'connect';

/** `act` of the liveness ping frame. */
export const ACT_HEARTBEAT = 'get_onlines';
