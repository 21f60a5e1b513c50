import type { Result } from 'neverthrow';
import { type StatsValue, createStatsValue } from '../../core/branded-types.js';
import type { GatewayError } from '../../core/errors.js';
import type {
  ExtractionOutcome,
  InterceptResult,
  InvalidationReason,
} from '../../core/types.js';
import { config } from '../../lib/config.js';
import { childLogger } from '../../lib/logger.js';
import { trackCacheInvalidation, trackExtraction } from '../../lib/metrics.js';
import { FRAGMENT_STRATEGIES, type StatsStrategy, pickFirst } from './disambiguation.js';
import { sanitize } from './sanitizer.js';
import { type StatsCache, statsCache } from './stats-cache.js';
import { normalize } from './text-normalizer.js';

const log = childLogger('stats-extractor');

export interface StatsExtractorOptions {
  maxValue: number;
  strategies: readonly StatsStrategy[];
}

const NO_VALUE: ExtractionOutcome = { value: null, cached: false };

/**
 * Recovers the view count from a rendered blog-stats fragment.
 *
 * Total by contract: every failure (blank input, no number, out-of-range value)
 * comes back as `null`, which callers must read as "keep the original markup",
 * never as zero. Only successful extractions are cached.
 */
export class StatsExtractor {
  private readonly options: StatsExtractorOptions;

  constructor(
    private readonly cache: StatsCache,
    options: Partial<StatsExtractorOptions> = {}
  ) {
    this.options = {
      maxValue: options.maxValue ?? config.maxStatsValue,
      strategies: options.strategies ?? FRAGMENT_STRATEGIES,
    };
  }

  extract(html: string): StatsValue | null {
    return this.extractWithDetails(html).value;
  }

  extractWithDetails(html: string): ExtractionOutcome {
    if (html.trim() === '') {
      return NO_VALUE;
    }

    const key = this.cache.keyFor(html);
    const cached = this.cache.get(key);
    if (cached !== null) {
      return { value: cached, cached: true };
    }

    const text = normalize(html);
    const match = pickFirst({ text, html }, this.options.strategies);
    if (match === null) {
      trackExtraction('none', false);
      log.debug({ textLength: text.length }, 'No stats candidate found');
      return NO_VALUE;
    }

    const sanitized = sanitize(match.value, this.options.maxValue);
    if (sanitized === null) {
      trackExtraction(match.strategy, false);
      log.debug({ strategy: match.strategy, raw: match.value }, 'Stats value out of bounds');
      return NO_VALUE;
    }

    const value = createStatsValue(sanitized);
    trackExtraction(match.strategy, true);
    this.cache.put(key, value);
    return { value, cached: false, strategy: match.strategy };
  }

  /**
   * Pass-through filter for the block render hook: the original fragment comes
   * back untouched unless a count was recovered.
   */
  intercept(html: string): InterceptResult {
    const value = this.extract(html);
    if (value === null) {
      return { transformed: false, html };
    }
    return { transformed: true, value };
  }

  invalidate(reason: InvalidationReason): Result<number, GatewayError> {
    return this.cache
      .clearAll()
      .map((cleared) => {
        trackCacheInvalidation(reason);
        log.info({ reason, cleared }, 'Stats cache invalidated');
        return cleared;
      })
      .mapErr((error) => {
        log.error({ reason, error: error.message }, 'Stats cache invalidation failed');
        return error;
      });
  }

  clearEntry(key: string): Result<boolean, GatewayError> {
    return this.cache.clear(key);
  }
}

export const statsExtractor = new StatsExtractor(statsCache);
