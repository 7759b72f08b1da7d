/**
 * Error classification and structured logging.
 */
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import pino from 'pino';
import { PulseError, PulseErrorCode, createLogger, getLogger, setLogger } from '../../../src/index.js';
import { errorMessage } from '../../../src/errors.js';
import { isLogLevel } from '../../../src/logger.js';
import { recordingLogger } from '../../helpers/fakes.js';

describe('ERR: PulseError', () => {
  it('ERR-001: only decode errors are recoverable', () => {
    for (const code of Object.values(PulseErrorCode)) {
      const err = new PulseError(code, 'x');
      expect(err.fatal).toBe(code !== PulseErrorCode.DECODE_ERROR);
    }
  });

  it('ERR-002: transient failures are retryable', () => {
    expect(PulseError.transportError('x').retryable).toBe(true);
    expect(PulseError.heartbeatTimeout(5_000).retryable).toBe(true);
    expect(PulseError.requestFailed('x', 503).retryable).toBe(true);
    expect(PulseError.rulesMalformed('x').retryable).toBe(false);
    expect(PulseError.handshakeProtocol('x').retryable).toBe(false);
    expect(PulseError.configInvalid('x').retryable).toBe(false);
  });

  it('ERR-003: factories set code, status and cause', () => {
    const cause = new Error('socket hang up');
    const err = PulseError.requestFailed('GET /x returned status 502', 502, cause);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('PulseError');
    expect(err.code).toBe(PulseErrorCode.REQUEST_FAILED);
    expect(err.status).toBe(502);
    expect(err.cause).toBe(cause);
  });

  it('ERR-004: no cause is attached when none is given', () => {
    const err = PulseError.decodeError('bad');
    expect('cause' in err).toBe(false);
    expect(err.status).toBeUndefined();
  });

  it('ERR-005: errorMessage handles any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('LOG: PulseLogger', () => {
  afterEach(() => {
    setLogger(createLogger({ level: 'silent' }));
  });

  it('LOG-001: lines carry the message, level and data', () => {
    const { logger, lines } = recordingLogger('info');
    logger.info('Session connected', { url: 'wss://rt.example.test/' });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'info',
      msg: 'Session connected',
      url: 'wss://rt.example.test/',
      name: 'pulsewire',
    });
  });

  it('LOG-002: lines below the level are dropped', () => {
    const { logger, lines } = recordingLogger('info');
    logger.debug('hidden');
    logger.trace('hidden');
    logger.warn('shown');
    expect(lines.map((l) => l.msg)).toEqual(['shown']);
  });

  it('LOG-003: child loggers add their bindings', () => {
    const { logger, lines } = recordingLogger('debug');
    logger.child({ component: 'session' }).child({ unit: 'heartbeat' }).debug('Heartbeat sent', { ping: 1 });
    expect(lines[0]).toMatchObject({ component: 'session', unit: 'heartbeat', ping: 1 });
  });

  it('LOG-004: errors are serialised under err', () => {
    const { logger, lines } = recordingLogger('info');
    logger.error('Request rejected', new Error('boom'));
    const err = lines[0]?.err;
    expect(typeof err === 'object' && err !== null && 'message' in err ? err.message : null).toBe('boom');
  });

  it('LOG-005: the process default can be replaced', () => {
    const { logger } = recordingLogger('info');
    setLogger(logger);
    expect(getLogger()).toBe(logger);
  });

  it('LOG-006: level names are recognised', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
  it('LOG-007: lines reach a pino destination stream', () => {
    const dir = mkdtempSync(join(tmpdir(), 'pulsewire-log-'));
    const file = join(dir, 'out.log');
    const destination = pino.destination({ dest: file, sync: true });
    try {
      createLogger({ level: 'info', destination }).info('Rules refreshed', { count: 1 });
      destination.flushSync();
      const [line] = readFileSync(file, 'utf8').trim().split('\n');
      expect(JSON.parse(line ?? '')).toMatchObject({
        level: 'info',
        name: 'pulsewire',
        msg: 'Rules refreshed',
        count: 1,
      });
    } finally {
      destination.end();
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
