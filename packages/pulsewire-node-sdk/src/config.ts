/**
 * Loading of the on-disk configuration and authentication files.
 *
 * Config file (JSON):
 *   { "rulesUrl", "profileUrl", "origin", "authFile"?, "rulesTtlSeconds"?,
 *     "requestTimeoutMs"?, "connectTimeoutMs"?, "heartbeatPeriodMs"?,
 *     "heartbeatAckTimeoutMs"?, "logLevel"? }
 *
 * Auth file (JSON):
 *   { "auth": { "cookie": "sess=…; auth_id=…", "user_agent": "…", "x_bc": "…" } }
 */
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { CookieJar } from 'tough-cookie';
import { z } from 'zod';
import { pulseCreateAuthContext } from './auth-context.js';
import type { AuthContext } from './auth-context.js';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_ACK_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_PERIOD_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RULES_TTL_SECONDS,
} from './constants.js';
import { PulseError, errorMessage } from './errors.js';
import { describeIssues } from './validate.js';
import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

// ── Schemas ────────────────────────────────────────────────────────

const LogLevelSchema = z.string().refine(isLogLevel, { message: 'Unknown log level' });

const ConfigFileSchema = z
  .object({
    rulesUrl: z.string().url(),
    profileUrl: z.string().url(),
    origin: z.string().url(),
    authFile: z.string().min(1).default('auth.json'),
    rulesTtlSeconds: z.number().int().positive().default(DEFAULT_RULES_TTL_SECONDS),
    requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
    heartbeatPeriodMs: z.number().int().positive().default(DEFAULT_HEARTBEAT_PERIOD_MS),
    heartbeatAckTimeoutMs: z.number().int().positive().default(DEFAULT_HEARTBEAT_ACK_TIMEOUT_MS),
    logLevel: LogLevelSchema.default('info'),
  })
  .refine((cfg) => cfg.heartbeatAckTimeoutMs < cfg.heartbeatPeriodMs, {
    message: 'heartbeatAckTimeoutMs must be shorter than heartbeatPeriodMs',
    path: ['heartbeatAckTimeoutMs'],
  });

const NonEmpty = z.string().trim().min(1, { message: 'must not be empty' });

const AuthFileSchema = z.object({
  auth: z.object({
    cookie: NonEmpty,
    user_agent: NonEmpty,
    x_bc: NonEmpty,
  }),
});

// ── Types ──────────────────────────────────────────────────────────

export interface PulseConfig {
  rulesUrl: string;
  profileUrl: string;
  origin: string;
  /** Absolute path of the auth file, resolved against the config file. */
  authFile: string;
  rulesTtlSeconds: number;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  heartbeatPeriodMs: number;
  heartbeatAckTimeoutMs: number;
  logLevel: LogLevel;
}

// ── Helpers ────────────────────────────────────────────────────────

async function readJsonFile(path: string, what: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err: unknown) {
    throw PulseError.configInvalid(`Cannot read ${what} ${path}: ${errorMessage(err)}`, err);
  }
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw PulseError.configInvalid(`${what} ${path} is not valid JSON`, err);
  }
}

/**
 * Split a `Cookie`-style header into name/value pairs. Empty segments are
 * skipped; a segment without `=` is an error.
 */
export function pulseSplitCookieHeader(header: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const segment of header.split(';')) {
    const trimmed = segment.trim();
    if (trimmed.length === 0) continue;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) {
      throw PulseError.configInvalid(`Malformed cookie segment: ${trimmed.split('=')[0] || '<empty>'}`);
    }
    pairs.push([trimmed.slice(0, eq).trim(), trimmed.slice(eq + 1).trim()]);
  }
  return pairs;
}

// ── Loaders ────────────────────────────────────────────────────────

/**
 * Load and validate the config file. `PULSE_LOG_LEVEL` in `env` overrides
 * the file's log level.
 *
 * @throws PulseError(CONFIG_INVALID)
 */
export async function pulseLoadConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PulseConfig> {
  const raw = await readJsonFile(path, 'config file');
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw PulseError.configInvalid(`Config file ${path} is invalid: ${describeIssues(parsed.error)}`);
  }

  const cfg = parsed.data;
  const envLevel = env.PULSE_LOG_LEVEL;
  let logLevel: LogLevel = cfg.logLevel;
  if (envLevel !== undefined) {
    if (!isLogLevel(envLevel)) {
      throw PulseError.configInvalid(`PULSE_LOG_LEVEL has unknown level: ${envLevel}`);
    }
    logLevel = envLevel;
  }

  return {
    ...cfg,
    authFile: resolve(dirname(path), cfg.authFile),
    logLevel,
  };
}

/**
 * Load credentials from an auth file into a fresh cookie jar for `origin`.
 * The `sess` and `auth_id` cookies are required; `auth_id` becomes the
 * subject id.
 *
 * @throws PulseError(CONFIG_INVALID)
 */
export async function pulseLoadAuth(path: string, origin: string): Promise<AuthContext> {
  const raw = await readJsonFile(path, 'auth file');
  const parsed = AuthFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw PulseError.configInvalid(`Auth file ${path} is invalid: ${describeIssues(parsed.error)}`);
  }

  const { cookie, user_agent: userAgent, x_bc: clientId } = parsed.data.auth;
  const jar = new CookieJar();
  let subjectId: string | undefined;
  let hasSession = false;

  for (const [name, value] of pulseSplitCookieHeader(cookie)) {
    try {
      await jar.setCookie(`${name}=${value}`, origin);
    } catch (err: unknown) {
      throw PulseError.configInvalid(`Cookie ${name} was rejected: ${errorMessage(err)}`, err);
    }
    if (name === 'sess') hasSession = true;
    if (name === 'auth_id') subjectId = value;
  }

  if (!hasSession) {
    throw PulseError.configInvalid("Cookie is missing 'sess' field");
  }
  if (subjectId === undefined || subjectId.length === 0) {
    throw PulseError.configInvalid("Cookie is missing 'auth_id' field");
  }

  return pulseCreateAuthContext({ subjectId, clientId, userAgent, cookieJar: jar });
}
