import { DEFAULT_RULES_TTL_SECONDS } from './constants.js';
import { PulseError } from './errors.js';
import { getLogger } from './logger.js';
import type { PulseLogger } from './logger.js';
import type { DynamicRules, RuleSource } from './rules.js';
import { systemClock } from './timing.js';
import type { Clock } from './timing.js';

// ── Types ──────────────────────────────────────────────────────────

export interface PulseRuleCacheOptions {
  source: RuleSource;
  ttlSeconds?: number;
  clock?: Clock;
  logger?: PulseLogger;
}

interface CacheEntry {
  rules: DynamicRules;
  expiresAt: number;
}

// ── Implementation ─────────────────────────────────────────────────

/**
 * Time-bounded cache of the signing rules with single-flight refresh.
 *
 * - A cached value is returned until `fetchedAt + ttl` has passed.
 * - Callers arriving while a refresh is in flight share that refresh,
 *   and all of them see its value or its error.
 * - A failed refresh is not cached; the next call fetches again.
 */
export class PulseRuleCache {
  private readonly _source: RuleSource;
  private readonly _ttlMs: number;
  private readonly _clock: Clock;
  private readonly _logger: PulseLogger;
  private _entry: CacheEntry | null = null;
  private _inflight: Promise<DynamicRules> | null = null;

  constructor(options: PulseRuleCacheOptions) {
    const ttl = options.ttlSeconds ?? DEFAULT_RULES_TTL_SECONDS;
    if (!Number.isFinite(ttl) || ttl <= 0) {
      throw PulseError.configInvalid('Rule cache TTL must be a positive number of seconds');
    }

    this._source = options.source;
    this._ttlMs = ttl * 1000;
    this._clock = options.clock ?? systemClock;
    this._logger = options.logger ?? getLogger().child({ component: 'rule-cache' });
  }

  get(): Promise<DynamicRules> {
    const entry = this._entry;
    if (entry && this._clock.now() <= entry.expiresAt) {
      return Promise.resolve(entry.rules);
    }

    if (this._inflight) {
      return this._inflight;
    }

    const refresh = this._refresh().finally(() => {
      this._inflight = null;
    });
    this._inflight = refresh;
    return refresh;
  }

  /** Drop the cached value; the next `get()` fetches. */
  invalidate(): void {
    this._entry = null;
  }

  /** Expiry of the cached value in clock milliseconds, or null when empty. */
  get expiresAt(): number | null {
    return this._entry?.expiresAt ?? null;
  }

  private async _refresh(): Promise<DynamicRules> {
    this._logger.debug('Refreshing rules');
    const rules = await this._source.fetchRules();
    this._entry = { rules, expiresAt: this._clock.now() + this._ttlMs };
    return rules;
  }
}
