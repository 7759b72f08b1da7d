/**
 * Step-by-step debug tracing of request signing.
 *
 * Runs the signing pipeline one stage at a time and records each stage with
 * its timing, inputs and outputs. The static parameter is REDACTED in trace
 * output.
 */
import { performance } from 'node:perf_hooks';
import { PulseError, errorMessage } from './errors.js';
import { pulseSha1Hex } from './hash.js';
import type { SignedHeaderSet } from './headers.js';
import type { DynamicRules } from './rules.js';
import {
  pulseAssembleHeaders,
  pulseBuildSignPath,
  pulseComposeSignMessage,
  pulseComputeChecksum,
  pulseJoinSign,
} from './signer.js';
import type { SigningSubject } from './signer.js';
import { pulseValidateTimestamp } from './validate.js';

// ── Types ──────────────────────────────────────────────────────────

export interface TraceStep {
  step: number;
  name: string;
  input: Record<string, unknown>;
  output: Record<string, unknown> | null;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export interface SignDebugInput {
  rules: DynamicRules;
  subject: SigningSubject;
  url: string;
  /** Unix seconds. */
  timestamp: number;
}

export type SignDebugResult =
  | { ok: true; headers: SignedHeaderSet; trace: TraceStep[]; totalDurationMs: number }
  | { ok: false; error: PulseError; trace: TraceStep[]; totalDurationMs: number };

const TOTAL_STEPS = 5;

// ── Helpers ────────────────────────────────────────────────────────

function redact(value: string): string {
  if (value.length <= 4) return '[REDACTED]';
  return value.slice(0, 4) + '...';
}

function traceStep<T extends Record<string, unknown>>(
  trace: TraceStep[],
  stepNum: number,
  name: string,
  inputData: Record<string, unknown>,
  fn: () => T,
): T {
  const start = performance.now();
  try {
    const output = fn();
    trace.push({
      step: stepNum,
      name,
      input: inputData,
      output,
      durationMs: performance.now() - start,
      ok: true,
    });
    return output;
  } catch (err: unknown) {
    trace.push({
      step: stepNum,
      name,
      input: inputData,
      output: null,
      durationMs: performance.now() - start,
      ok: false,
      error: errorMessage(err),
    });
    throw err;
  }
}

// ── pulseSignDebug ─────────────────────────────────────────────────

/**
 * Sign like `pulseSign`, recording every stage. Never throws; a failing
 * stage ends the trace and the error is returned.
 */
export function pulseSignDebug(input: SignDebugInput): SignDebugResult {
  const totalStart = performance.now();
  const trace: TraceStep[] = [];
  const { rules, subject } = input;

  try {
    const { path } = traceStep(trace, 1, 'build_path', { url: input.url }, () => {
      return { path: pulseBuildSignPath(input.url) };
    });

    let message = '';
    const { time } = traceStep(
      trace, 2, 'compose_message',
      { staticParam: redact(rules.staticParam), timestamp: input.timestamp, path, subjectId: subject.subjectId },
      () => {
        pulseValidateTimestamp(input.timestamp);
        const t = String(input.timestamp);
        message = pulseComposeSignMessage(rules, subject.subjectId, path, t);
        return { time: t, messageLength: message.length };
      },
    );

    const { digest } = traceStep(
      trace, 3, 'digest',
      { messageLength: message.length },
      () => ({ digest: pulseSha1Hex(message) }),
    );

    const { checksum, sign } = traceStep(
      trace, 4, 'checksum',
      { indexes: rules.checksumIndexes.join(','), constant: rules.checksumConstant },
      () => {
        const c = pulseComputeChecksum(digest, rules.checksumIndexes, rules.checksumConstant);
        return { checksum: c, sign: pulseJoinSign(rules, digest, c) };
      },
    );

    const { headers } = traceStep(
      trace, 5, 'assemble_headers',
      { time, checksum },
      () => ({ headers: pulseAssembleHeaders(rules, subject, time, sign) }),
    );

    return { ok: true, headers, trace, totalDurationMs: performance.now() - totalStart };
  } catch (err: unknown) {
    const error = err instanceof PulseError ? err : PulseError.signingFailed(errorMessage(err));
    return { ok: false, error, trace, totalDurationMs: performance.now() - totalStart };
  }
}

// ── pulseFormatTrace ───────────────────────────────────────────────

export function pulseFormatTrace(trace: readonly TraceStep[]): string {
  if (trace.length === 0) return '(empty trace)';

  const lines: string[] = [];
  for (const step of trace) {
    const status = step.ok ? 'OK' : 'FAIL';
    const duration = step.durationMs.toFixed(2);
    const dots = '.'.repeat(Math.max(1, 30 - step.name.length));
    lines.push(`[${step.step}/${TOTAL_STEPS}] ${step.name} ${dots} ${status} (${duration}ms)`);

    if (step.output) {
      for (const [key, value] of Object.entries(step.output)) {
        if (typeof value === 'object' && value !== null) continue;
        const display = typeof value === 'string' ? `"${value}"` : String(value);
        lines.push(`      ${key}: ${display}`);
      }
    }

    if (step.error) {
      lines.push(`      error: "${step.error}"`);
    }
  }

  return lines.join('\n');
}
