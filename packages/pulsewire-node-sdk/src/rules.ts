import { z } from 'zod';
import { PulseError, errorMessage } from './errors.js';
import { HEADER_IF_MODIFIED_SINCE, HEADER_LAST_MODIFIED } from './headers.js';
import { describeIssues } from './validate.js';
import { isSuccessStatus } from './http-transport.js';
import type { HttpResponse, HttpTransport } from './http-transport.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';

// ── Types ──────────────────────────────────────────────────────────

/**
 * Rule set used to sign requests. Immutable once parsed; a refresh replaces
 * the whole object.
 */
export interface DynamicRules {
  readonly appToken: string;
  readonly staticParam: string;
  readonly prefix: string;
  readonly suffix: string;
  readonly checksumConstant: number;
  readonly checksumIndexes: readonly number[];
}

/** Anything that can produce a fresh rule set. */
export interface RuleSource {
  fetchRules(): Promise<DynamicRules>;
}

// ── Wire schema ────────────────────────────────────────────────────

/**
 * Field names are owned by the rule publisher. Unknown fields are stripped.
 */
const RuleDocumentSchema = z.object({
  'app-token': z.string(),
  static_param: z.string(),
  prefix: z.string(),
  suffix: z.string(),
  checksum_constant: z.number().int().min(-2147483648).max(2147483647),
  checksum_indexes: z.array(z.number().int().nonnegative()),
});

/**
 * Parse and validate a rule document body.
 *
 * @throws PulseError(RULE_FETCH_FAILED) on invalid JSON or schema mismatch.
 */
export function pulseParseRules(body: string): DynamicRules {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err: unknown) {
    throw PulseError.ruleFetchFailed(`Rule document is not valid JSON: ${errorMessage(err)}`, err);
  }

  const parsed = RuleDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw PulseError.ruleFetchFailed(`Rule document is malformed: ${describeIssues(parsed.error)}`);
  }

  const doc = parsed.data;
  return Object.freeze({
    appToken: doc['app-token'],
    staticParam: doc.static_param,
    prefix: doc.prefix,
    suffix: doc.suffix,
    checksumConstant: doc.checksum_constant,
    checksumIndexes: Object.freeze([...doc.checksum_indexes]),
  });
}

// ── HTTP source ────────────────────────────────────────────────────

export interface PulseHttpRuleSourceOptions {
  url: string;
  transport: HttpTransport;
  logger?: PulseLogger;
}

/**
 * Fetches the rule document over plain HTTP (no signing, no cookies).
 *
 * Revalidates with If-Modified-Since once a document carrying Last-Modified
 * has been accepted; a 304 re-serves that document.
 */
export class PulseHttpRuleSource implements RuleSource {
  private readonly _url: string;
  private readonly _transport: HttpTransport;
  private readonly _logger: PulseLogger;
  private _last: { rules: DynamicRules; lastModified: string } | null = null;

  constructor(options: PulseHttpRuleSourceOptions) {
    this._url = options.url;
    this._transport = options.transport;
    this._logger = options.logger ?? getLogger().child({ component: 'rules' });
  }

  async fetchRules(): Promise<DynamicRules> {
    const headers: Record<string, string> = {};
    if (this._last) {
      headers[HEADER_IF_MODIFIED_SINCE] = this._last.lastModified;
    }

    let response: HttpResponse;
    try {
      response = await this._transport.send({ method: 'GET', url: this._url, headers });
    } catch (err: unknown) {
      this._logger.error('Error fetching rule document', { url: this._url, reason: errorMessage(err) });
      throw PulseError.ruleFetchFailed(`Rule document request failed: ${errorMessage(err)}`, err);
    }

    if (response.status === 304) {
      if (!this._last) {
        throw PulseError.ruleFetchFailed('Rule document reported not modified, but none is held');
      }
      this._logger.debug('Rule document not modified', { url: this._url });
      return this._last.rules;
    }

    if (!isSuccessStatus(response.status)) {
      this._logger.error('Rule document request rejected', { url: this._url, status: response.status });
      throw PulseError.ruleFetchFailed(`Rule document request returned status ${response.status}`);
    }

    const rules = pulseParseRules(response.body);
    const lastModified = response.headers[HEADER_LAST_MODIFIED];
    this._last = lastModified ? { rules, lastModified } : null;
    this._logger.info('Rule document fetched', { url: this._url });
    return rules;
  }
}
