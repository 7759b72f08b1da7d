/**
 * Config and auth file loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PulseError, PulseErrorCode, pulseLoadAuth, pulseLoadConfig } from '../../../src/index.js';

const ORIGIN = 'https://api.example.test';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'pulse-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeJson(name: string, value: unknown): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, typeof value === 'string' ? value : JSON.stringify(value), 'utf8');
  return path;
}

async function rejectionOf(promise: Promise<unknown>): Promise<PulseError> {
  try {
    await promise;
  } catch (err: unknown) {
    if (err instanceof PulseError) return err;
    throw err;
  }
  throw new Error('expected a rejection');
}

const BASE_CONFIG = {
  rulesUrl: 'https://rules.example.test/rules.json',
  profileUrl: `${ORIGIN}/api2/v2/users/me`,
  origin: ORIGIN,
};

// ── Config file ────────────────────────────────────────────────────

describe('CFG: pulseLoadConfig', () => {
  it('CFG-001: applies defaults and resolves the auth file beside the config', async () => {
    const path = await writeJson('config.json', BASE_CONFIG);
    const config = await pulseLoadConfig(path, {});
    expect(config).toEqual({
      ...BASE_CONFIG,
      authFile: join(dir, 'auth.json'),
      rulesTtlSeconds: 3600,
      requestTimeoutMs: 30_000,
      connectTimeoutMs: 10_000,
      heartbeatPeriodMs: 20_000,
      heartbeatAckTimeoutMs: 5_000,
      logLevel: 'info',
    });
  });

  it('CFG-002: PULSE_LOG_LEVEL overrides the file', async () => {
    const path = await writeJson('config.json', { ...BASE_CONFIG, logLevel: 'warn' });
    const config = await pulseLoadConfig(path, { PULSE_LOG_LEVEL: 'debug' });
    expect(config.logLevel).toBe('debug');
  });

  it('CFG-003: unknown env level is rejected', async () => {
    const path = await writeJson('config.json', BASE_CONFIG);
    const err = await rejectionOf(pulseLoadConfig(path, { PULSE_LOG_LEVEL: 'loud' }));
    expect(err.code).toBe(PulseErrorCode.CONFIG_INVALID);
    expect(err.message).toBe('PULSE_LOG_LEVEL has unknown level: loud');
  });

  it('CFG-004: ack timeout must be shorter than the period', async () => {
    const path = await writeJson('config.json', {
      ...BASE_CONFIG,
      heartbeatPeriodMs: 5_000,
      heartbeatAckTimeoutMs: 5_000,
    });
    const err = await rejectionOf(pulseLoadConfig(path, {}));
    expect(err.message).toBe(
      `Config file ${path} is invalid: heartbeatAckTimeoutMs: heartbeatAckTimeoutMs must be shorter than heartbeatPeriodMs`,
    );
  });

  it('CFG-005: missing file and bad JSON are config errors', async () => {
    const missing = join(dir, 'nope.json');
    const err = await rejectionOf(pulseLoadConfig(missing, {}));
    expect(err.code).toBe(PulseErrorCode.CONFIG_INVALID);
    expect(err.message.startsWith(`Cannot read config file ${missing}: `)).toBe(true);

    const broken = await writeJson('broken.json', '{');
    const err2 = await rejectionOf(pulseLoadConfig(broken, {}));
    expect(err2.message).toBe(`config file ${broken} is not valid JSON`);
  });

  it('CFG-006: invalid URL names the field', async () => {
    const path = await writeJson('config.json', { ...BASE_CONFIG, rulesUrl: 'not a url' });
    const err = await rejectionOf(pulseLoadConfig(path, {}));
    expect(err.message).toBe(`Config file ${path} is invalid: rulesUrl: Invalid url`);
  });
});

// ── Auth file ──────────────────────────────────────────────────────

describe('CFG: pulseLoadAuth', () => {
  const AUTH = {
    auth: {
      cookie: 'sess=test-session; auth_id=12345; lang=en',
      user_agent: 'test-agent/1.0',
      x_bc: 'test-client-id',
    },
  };

  it('CFG-AUTH-001: builds the context and loads every cookie', async () => {
    const path = await writeJson('auth.json', AUTH);
    const auth = await pulseLoadAuth(path, ORIGIN);
    expect(auth.subjectId).toBe('12345');
    expect(auth.clientId).toBe('test-client-id');
    expect(auth.userAgent).toBe('test-agent/1.0');
    await expect(auth.cookieJar.getCookieString(`${ORIGIN}/api2/v2/users/me`)).resolves.toBe(
      'sess=test-session; auth_id=12345; lang=en',
    );
  });

  it('CFG-AUTH-002: sess is required', async () => {
    const path = await writeJson('auth.json', { auth: { ...AUTH.auth, cookie: 'auth_id=12345' } });
    const err = await rejectionOf(pulseLoadAuth(path, ORIGIN));
    expect(err.message).toBe("Cookie is missing 'sess' field");
  });

  it('CFG-AUTH-003: auth_id is required', async () => {
    const path = await writeJson('auth.json', { auth: { ...AUTH.auth, cookie: 'sess=test-session' } });
    const err = await rejectionOf(pulseLoadAuth(path, ORIGIN));
    expect(err.message).toBe("Cookie is missing 'auth_id' field");
  });

  it('CFG-AUTH-004: blank fields are rejected', async () => {
    const path = await writeJson('auth.json', { auth: { ...AUTH.auth, x_bc: '   ' } });
    const err = await rejectionOf(pulseLoadAuth(path, ORIGIN));
    expect(err.code).toBe(PulseErrorCode.CONFIG_INVALID);
    expect(err.message).toBe(`Auth file ${path} is invalid: auth.x_bc: must not be empty`);
  });
});
