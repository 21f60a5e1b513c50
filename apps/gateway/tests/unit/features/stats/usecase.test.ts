import { beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../../../../src/core/errors.js';
import { StrategyName } from '../../../../src/core/types.js';
import { StatsCache } from '../../../../src/features/stats/stats-cache.js';
import { StatsExtractor } from '../../../../src/features/stats/usecase.js';
import { FakeKeyValueStore } from '../../../helpers/fake-store.js';
import { STATS_FRAGMENTS } from '../../../helpers/fixtures.js';

describe('StatsExtractor', () => {
  let store: FakeKeyValueStore;
  let cache: StatsCache;
  let extractor: StatsExtractor;

  beforeEach(() => {
    store = new FakeKeyValueStore();
    cache = new StatsCache(store, { namespace: 'test_', ttlMs: 60_000 });
    extractor = new StatsExtractor(cache);
  });

  describe('extract', () => {
    const cases = [
      { name: 'simple', html: STATS_FRAGMENTS.simple, expected: 1142 },
      { name: 'with_year_note', html: STATS_FRAGMENTS.withYearNote, expected: 1142 },
      { name: 'year_first', html: STATS_FRAGMENTS.yearFirst, expected: 2024 },
      { name: 'european_grouping', html: STATS_FRAGMENTS.europeanGrouping, expected: 1234567 },
      { name: 'space_grouping', html: STATS_FRAGMENTS.spaceGrouping, expected: 12345 },
      { name: 'script_and_style', html: STATS_FRAGMENTS.withScriptAndStyle, expected: 9876 },
      { name: 'data_count', html: STATS_FRAGMENTS.dataCount, expected: 4321 },
    ];

    for (const c of cases) {
      it(`extracts_${c.name}`, () => {
        expect(extractor.extract(c.html)).toBe(c.expected);
      });
    }

    it('returns_null_without_a_number_and_does_not_cache', () => {
      expect(extractor.extract(STATS_FRAGMENTS.noNumber)).toBeNull();
      expect(store.calls.set).toBe(0);
    });

    it('returns_null_above_the_ceiling_and_does_not_cache', () => {
      expect(extractor.extract(STATS_FRAGMENTS.tooLarge)).toBeNull();
      expect(store.calls.set).toBe(0);
    });

    it('short_circuits_blank_input_without_touching_the_cache', () => {
      expect(extractor.extract('   \n ')).toBeNull();
      expect(extractor.extract('')).toBeNull();
      expect(store.calls.get).toBe(0);
      expect(store.calls.set).toBe(0);
    });

    it('honors_a_custom_ceiling', () => {
      const strict = new StatsExtractor(cache, { maxValue: 1000 });
      expect(strict.extract(STATS_FRAGMENTS.simple)).toBeNull();
    });
  });

  describe('caching', () => {
    it('serves_the_second_identical_call_from_cache', () => {
      const first = extractor.extractWithDetails(STATS_FRAGMENTS.simple);
      const second = extractor.extractWithDetails(STATS_FRAGMENTS.simple);

      expect(first).toEqual({ value: 1142, cached: false, strategy: StrategyName.FirstCandidate });
      expect(second).toEqual({ value: 1142, cached: true });
      expect(store.calls.set).toBe(1);
    });

    it('caches_distinct_fragments_under_distinct_keys', () => {
      extractor.extract(STATS_FRAGMENTS.simple);
      extractor.extract(STATS_FRAGMENTS.yearFirst);

      expect(store.size()).toBe(2);
      expect(store.peek(cache.keyFor(STATS_FRAGMENTS.simple))).toBe(1142);
      expect(store.peek(cache.keyFor(STATS_FRAGMENTS.yearFirst))).toBe(2024);
    });

    it('recomputes_after_invalidation', () => {
      extractor.extract(STATS_FRAGMENTS.simple);
      extractor.extract(STATS_FRAGMENTS.yearFirst);

      expect(extractor.invalidate('settings-change')._unsafeUnwrap()).toBe(2);
      expect(extractor.extractWithDetails(STATS_FRAGMENTS.simple)).toEqual({
        value: 1142,
        cached: false,
        strategy: StrategyName.FirstCandidate,
      });
    });

    it('removes_the_legacy_slot_on_uninstall', () => {
      store.seed(cache.legacySlotKey(), '500');

      expect(extractor.invalidate('uninstall')._unsafeUnwrap()).toBe(1);
      expect(store.peek(cache.legacySlotKey())).toBeUndefined();
    });

    it('still_returns_the_value_when_the_cache_write_fails', () => {
      store.failing.set = true;

      expect(extractor.extract(STATS_FRAGMENTS.simple)).toBe(1142);
      expect(extractor.extractWithDetails(STATS_FRAGMENTS.simple).cached).toBe(false);
    });

    it('recomputes_and_repairs_a_corrupted_entry', () => {
      const key = cache.keyFor(STATS_FRAGMENTS.simple);
      store.seed(key, 'not-a-number');

      expect(extractor.extractWithDetails(STATS_FRAGMENTS.simple)).toEqual({
        value: 1142,
        cached: false,
        strategy: StrategyName.FirstCandidate,
      });
      expect(store.peek(key)).toBe(1142);
    });

    it('clears_a_single_entry_by_key', () => {
      extractor.extract(STATS_FRAGMENTS.simple);
      const key = cache.keyFor(STATS_FRAGMENTS.simple);

      expect(extractor.clearEntry(key)._unsafeUnwrap()).toBe(true);
      expect(store.peek(key)).toBeUndefined();
    });

    it('reports_invalidation_failure', () => {
      store.failing.deleteByPrefix = true;

      const result = extractor.invalidate('manual');

      expect(result._unsafeUnwrapErr().code).toBe(ErrorCode.CACHE_UNAVAILABLE);
    });
  });

  describe('intercept', () => {
    it('passes_the_original_fragment_through_when_nothing_is_found', () => {
      expect(extractor.intercept(STATS_FRAGMENTS.noNumber)).toEqual({
        transformed: false,
        html: STATS_FRAGMENTS.noNumber,
      });
    });

    it('passes_empty_fragments_through', () => {
      expect(extractor.intercept('')).toEqual({ transformed: false, html: '' });
    });

    it('returns_the_value_when_extraction_succeeds', () => {
      expect(extractor.intercept(STATS_FRAGMENTS.simple)).toEqual({
        transformed: true,
        value: 1142,
      });
    });
  });
});
