/**
 * pulsewire CLI
 *
 * Commands: sign, checksum, decode, inspect, rules, listen, version, help
 * Argument parsing uses Node.js built-in parseArgs.
 */
import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import pino from 'pino';
import { PulseClient } from './client.js';
import { pulseLoadAuth, pulseLoadConfig } from './config.js';
import { PULSE_SDK_VERSION } from './constants.js';
import { pulseFormatTrace, pulseSignDebug } from './debug.js';
import { PulseError, errorMessage } from './errors.js';
import { PulseFetchTransport } from './http-transport.js';
import { createLogger, setLogger } from './logger.js';
import { pulseDecodeFrame } from './messages.js';
import { PulseRuleCache } from './rule-cache.js';
import { PulseHttpRuleSource, pulseParseRules } from './rules.js';
import type { DynamicRules } from './rules.js';
import { pulseComputeChecksum, pulseSign } from './signer.js';
import type { SigningSubject } from './signer.js';
import { PulseSessionSupervisor } from './supervisor.js';
import type { DisconnectOutcome } from './supervisor.js';
import { Deferred, systemClock, unixSeconds } from './timing.js';
import { pulseParseTimestamp, pulseValidateDigest } from './validate.js';

// ── Exit codes ────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;
export const EXIT_ERROR = 3;

// ── IO ────────────────────────────────────────────────────────────

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  readStdin(): Promise<string>;
  env: NodeJS.ProcessEnv;
  /** Stops a running `listen`. */
  signal?: AbortSignal;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export function processIo(signal?: AbortSignal): CliIo {
  return {
    out: (line) => process.stdout.write(line + '\n'),
    err: (line) => process.stderr.write(line + '\n'),
    readStdin: readProcessStdin,
    env: process.env,
    signal,
  };
}

// ── Helpers ───────────────────────────────────────────────────────

class UsageError extends Error {}

function usage(io: CliIo, message: string, jsonMode: boolean): number {
  if (jsonMode) {
    io.out(JSON.stringify({ error: 'USAGE_ERROR', message }));
  } else {
    io.err(`Error: ${message}`);
    io.err('Run "pulse help" for usage information.');
  }
  return EXIT_USAGE;
}

function failure(io: CliIo, err: unknown, jsonMode: boolean): number {
  const message = errorMessage(err);
  const code = err instanceof PulseError ? err.code : 'PULSE_INTERNAL_ERROR';
  if (jsonMode) {
    io.out(JSON.stringify({ error: code, message }));
  } else {
    io.err(`Error: ${message} (${code})`);
  }
  return EXIT_ERROR;
}

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value.length === 0) {
    throw new UsageError(`Missing required argument: --${flag}`);
  }
  return value;
}

function isParseArgsError(err: unknown): err is Error {
  return (
    err instanceof TypeError &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('ERR_PARSE_ARGS')
  );
}

const INTEGER_RE = /^-?[0-9]+$/;

function parseInteger(value: string, flag: string): number {
  if (!INTEGER_RE.test(value)) {
    throw new UsageError(`--${flag} must be an integer`);
  }
  return Number(value);
}

function parseIndexes(value: string): number[] {
  return value
    .split(',')
    .filter((part) => part.length > 0)
    .map((part) => parseInteger(part.trim(), 'indexes'));
}

async function loadRulesFile(path: string): Promise<DynamicRules> {
  let body: string;
  try {
    body = await readFile(path, 'utf8');
  } catch (err: unknown) {
    throw PulseError.configInvalid(`Cannot read rules file ${path}: ${errorMessage(err)}`, err);
  }
  return pulseParseRules(body);
}

// ── Signing inputs ────────────────────────────────────────────────

const SIGN_OPTIONS = {
  rules: { type: 'string' },
  url: { type: 'string' },
  'subject-id': { type: 'string' },
  'client-id': { type: 'string' },
  'user-agent': { type: 'string' },
  timestamp: { type: 'string' },
  json: { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
} as const;

const SIGN_USAGE = `Usage: pulse sign --rules <file> --url <url> --subject-id <id>
  --client-id <id> --user-agent <ua> [--timestamp <unix>] [--json]

Sign a request URL with a rule document and print the headers.`;

interface SignInputs {
  rulesPath: string;
  url: string;
  subject: SigningSubject;
  timestamp: number;
}

function readSignInputs(values: {
  rules?: string;
  url?: string;
  'subject-id'?: string;
  'client-id'?: string;
  'user-agent'?: string;
  timestamp?: string;
}): SignInputs {
  const rulesPath = required(values.rules, 'rules');
  const url = required(values.url, 'url');
  const subject: SigningSubject = {
    subjectId: required(values['subject-id'], 'subject-id'),
    clientId: required(values['client-id'], 'client-id'),
    userAgent: required(values['user-agent'], 'user-agent'),
  };
  const timestamp =
    values.timestamp === undefined
      ? unixSeconds(systemClock)
      : pulseParseTimestamp(values.timestamp);
  return { rulesPath, url, subject, timestamp };
}

// ── Command: sign ─────────────────────────────────────────────────

async function cmdSign(argv: string[], io: CliIo): Promise<number> {
  const { values } = parseArgs({ args: argv, options: SIGN_OPTIONS, strict: true });
  if (values.help) {
    io.out(SIGN_USAGE);
    return EXIT_OK;
  }
  const jsonMode = values.json;

  let inputs: SignInputs;
  try {
    inputs = readSignInputs(values);
  } catch (err: unknown) {
    if (err instanceof UsageError) return usage(io, err.message, jsonMode);
    return failure(io, err, jsonMode);
  }

  try {
    const rules = await loadRulesFile(inputs.rulesPath);
    const headers = pulseSign(rules, inputs.subject, inputs.url, inputs.timestamp);
    if (jsonMode) {
      io.out(JSON.stringify({ headers }));
    } else {
      for (const [name, value] of Object.entries(headers)) {
        io.out(`${name}: ${value}`);
      }
    }
    return EXIT_OK;
  } catch (err: unknown) {
    return failure(io, err, jsonMode);
  }
}

// ── Command: checksum ─────────────────────────────────────────────

function cmdChecksum(argv: string[], io: CliIo): number {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      indexes: { type: 'string' },
      constant: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: pulse checksum <digest> --indexes 0,5,17,39 --constant=<int> [--json]

Compute the checksum term for a 40-character SHA-1 hex digest.`);
    return EXIT_OK;
  }

  const jsonMode = values.json;
  const digest = positionals[0];
  if (digest === undefined) return usage(io, 'Missing digest', jsonMode);

  let indexes: number[];
  let constant: number;
  try {
    indexes = parseIndexes(required(values.indexes, 'indexes'));
    constant = parseInteger(required(values.constant, 'constant'), 'constant');
  } catch (err: unknown) {
    if (err instanceof UsageError) return usage(io, err.message, jsonMode);
    return failure(io, err, jsonMode);
  }

  try {
    pulseValidateDigest(digest);
    const checksum = pulseComputeChecksum(digest, indexes, constant);
    io.out(jsonMode ? JSON.stringify({ checksum }) : checksum);
    return EXIT_OK;
  } catch (err: unknown) {
    return failure(io, err, jsonMode);
  }
}

// ── Command: decode ───────────────────────────────────────────────

async function cmdDecode(argv: string[], io: CliIo): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: pulse decode <frame> [--json]
       pulse decode - [--json]     (read the frame from stdin)

Decode one inbound session frame. Exits 1 when the frame matches no shape.`);
    return EXIT_OK;
  }

  const jsonMode = values.json;
  let frame = positionals[0];
  if (frame === undefined) return usage(io, 'Missing frame', jsonMode);
  if (frame === '-') frame = (await io.readStdin()).trim();

  const result = pulseDecodeFrame(frame);
  if (!result.ok) {
    if (jsonMode) {
      io.out(JSON.stringify({ ok: false, error: result.error.code, message: result.error.message }));
    } else {
      io.out(`INVALID: ${result.error.message}`);
    }
    return EXIT_INVALID;
  }

  const message = result.message;
  if (jsonMode) {
    io.out(JSON.stringify({ ok: true, message }));
  } else if (message.kind === 'application') {
    io.out(`application: ${message.tag}`);
  } else {
    io.out(message.kind);
  }
  return EXIT_OK;
}

// ── Command: inspect ──────────────────────────────────────────────

async function cmdInspect(argv: string[], io: CliIo): Promise<number> {
  const { values } = parseArgs({ args: argv, options: SIGN_OPTIONS, strict: true });
  if (values.help) {
    io.out(`${SIGN_USAGE.replace('pulse sign', 'pulse inspect')}

Shows a step-by-step trace of the signing pipeline.`);
    return EXIT_OK;
  }
  const jsonMode = values.json;

  let inputs: SignInputs;
  try {
    inputs = readSignInputs(values);
  } catch (err: unknown) {
    if (err instanceof UsageError) return usage(io, err.message, jsonMode);
    return failure(io, err, jsonMode);
  }

  let rules: DynamicRules;
  try {
    rules = await loadRulesFile(inputs.rulesPath);
  } catch (err: unknown) {
    return failure(io, err, jsonMode);
  }

  const result = pulseSignDebug({ rules, subject: inputs.subject, url: inputs.url, timestamp: inputs.timestamp });
  if (jsonMode) {
    io.out(JSON.stringify({
      ok: result.ok,
      headers: result.ok ? result.headers : undefined,
      error: result.ok ? undefined : { code: result.error.code, message: result.error.message },
      totalDurationMs: result.totalDurationMs,
      trace: result.trace,
    }));
  } else {
    io.out(pulseFormatTrace(result.trace));
    io.out('');
    io.out(result.ok ? `sign: ${result.headers.sign}` : `FAILED: ${result.error.code}`);
    io.out(`totalDuration: ${result.totalDurationMs.toFixed(2)}ms`);
  }
  return result.ok ? EXIT_OK : EXIT_ERROR;
}

// ── Command: rules ────────────────────────────────────────────────

async function cmdRules(argv: string[], io: CliIo): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: pulse rules --config <file> [--json]

Fetch the current rule document and print a summary.`);
    return EXIT_OK;
  }
  const jsonMode = values.json;
  if (values.config === undefined) return usage(io, 'Missing required argument: --config', jsonMode);

  try {
    const config = await pulseLoadConfig(values.config, io.env);
    const logger = createLogger({ level: config.logLevel, destination: pino.destination(2) });
    const source = new PulseHttpRuleSource({
      url: config.rulesUrl,
      transport: new PulseFetchTransport({ timeoutMs: config.requestTimeoutMs }),
      logger,
    });
    const rules = await source.fetchRules();
    const summary = {
      appToken: rules.appToken,
      prefix: rules.prefix,
      suffix: rules.suffix,
      checksumConstant: rules.checksumConstant,
      checksumIndexes: rules.checksumIndexes,
    };
    if (jsonMode) {
      io.out(JSON.stringify(summary));
    } else {
      for (const [key, value] of Object.entries(summary)) {
        io.out(`${key}: ${Array.isArray(value) ? value.join(',') : String(value)}`);
      }
    }
    return EXIT_OK;
  } catch (err: unknown) {
    return failure(io, err, jsonMode);
  }
}

// ── Command: listen ───────────────────────────────────────────────

async function cmdListen(argv: string[], io: CliIo): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: pulse listen --config <file>

Open a session and print every message as one JSON line until interrupted.`);
    return EXIT_OK;
  }
  if (values.config === undefined) return usage(io, 'Missing required argument: --config', false);

  try {
    const config = await pulseLoadConfig(values.config, io.env);
    const logger = createLogger({ level: config.logLevel, destination: pino.destination(2) });
    setLogger(logger);

    const auth = await pulseLoadAuth(config.authFile, config.origin);
    const transport = new PulseFetchTransport({ timeoutMs: config.requestTimeoutMs });
    const rules = new PulseRuleCache({
      source: new PulseHttpRuleSource({ url: config.rulesUrl, transport, logger }),
      ttlSeconds: config.rulesTtlSeconds,
      logger,
    });
    const client = new PulseClient({ auth, rules, transport, logger });

    const ended = new Deferred<DisconnectOutcome>();
    const supervisor = new PulseSessionSupervisor({
      client,
      profileUrl: config.profileUrl,
      session: {
        connectTimeoutMs: config.connectTimeoutMs,
        periodMs: config.heartbeatPeriodMs,
        ackTimeoutMs: config.heartbeatAckTimeoutMs,
      },
      logger,
      onStart: (profile) => io.err(`Connected as ${profile.username}`),
      onMessage: (message) => io.out(JSON.stringify(message)),
      onDisconnect: (outcome) => ended.resolve(outcome),
    });

    await supervisor.start();

    const stop = (): void => {
      supervisor.stop().catch((err: unknown) => {
        logger.error('Stopping the session failed', { reason: errorMessage(err) });
      });
    };
    if (io.signal?.aborted) {
      stop();
    } else {
      io.signal?.addEventListener('abort', stop, { once: true });
    }

    const outcome = await ended.promise;
    io.signal?.removeEventListener('abort', stop);
    return outcome.ok ? EXIT_OK : failure(io, outcome.error, false);
  } catch (err: unknown) {
    return failure(io, err, false);
  }
}

// ── Command: version / help ───────────────────────────────────────

function cmdVersion(io: CliIo): number {
  io.out(`pulsewire-node-sdk v${PULSE_SDK_VERSION}`);
  return EXIT_OK;
}

function cmdHelp(io: CliIo): number {
  io.out(`pulsewire-node-sdk v${PULSE_SDK_VERSION}, pulse CLI

Commands:
  pulse sign       Sign a request URL and print the headers
  pulse checksum   Compute the checksum term for a digest
  pulse decode     Decode one inbound session frame
  pulse inspect    Show a debug trace of request signing
  pulse rules      Fetch and summarise the rule document
  pulse listen     Open a session and print its messages
  pulse version    Print SDK version
  pulse help       Print this help message

Use "pulse <command> --help" for more information on a specific command.

Exit codes:
  0  Success
  1  Invalid input (frame matches no shape)
  2  Usage error (missing args, unknown command)
  3  Error`);
  return EXIT_OK;
}

// ── Main ──────────────────────────────────────────────────────────

/**
 * Run one CLI invocation and return its exit code. Never calls
 * `process.exit`.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const command = argv[0];
  const commandArgs = argv.slice(1);

  try {
    switch (command) {
      case undefined:
      case 'help':
      case '--help':
        return cmdHelp(io);
      case 'sign':
        return await cmdSign(commandArgs, io);
      case 'checksum':
        return cmdChecksum(commandArgs, io);
      case 'decode':
        return await cmdDecode(commandArgs, io);
      case 'inspect':
        return await cmdInspect(commandArgs, io);
      case 'rules':
        return await cmdRules(commandArgs, io);
      case 'listen':
        return await cmdListen(commandArgs, io);
      case 'version':
      case '--version':
      case '-v':
        return cmdVersion(io);
      default:
        return usage(io, `Unknown command: ${command}`, argv.includes('--json'));
    }
  } catch (err: unknown) {
    if (isParseArgsError(err) || err instanceof UsageError) {
      return usage(io, err.message, argv.includes('--json'));
    }
    io.err(`Fatal: ${errorMessage(err)}`);
    return EXIT_ERROR;
  }
}
