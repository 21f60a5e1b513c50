import { StrategyName, type StrategyMatch } from '../../core/types.js';
import { type Candidate, parseNumberToken, scan } from './number-scanner.js';

export interface ExtractionInput {
  text: string;
  // Raw fragment, when the caller still has it
  html?: string;
}

export interface StatsStrategy {
  name: StrategyName;
  pick: (input: ExtractionInput) => number | null;
}

const DATA_COUNT_ATTRIBUTE = /data-count=["'](\d+)["']/;
const YEAR_MIN = 1900;
const YEAR_MAX = 2099;

export const looksLikeYear = (value: number): boolean =>
  value >= YEAR_MIN && value <= YEAR_MAX && String(value).length === 4;

export const dataCountAttribute: StatsStrategy = {
  name: StrategyName.DataCountAttribute,
  pick: ({ html }) => {
    if (!html) return null;
    const count = DATA_COUNT_ATTRIBUTE.exec(html)?.[1];
    return count === undefined ? null : parseNumberToken(count);
  },
};

// "1,142 hits": the count sits in front of its label. No year filter here.
export const firstCandidate: StatsStrategy = {
  name: StrategyName.FirstCandidate,
  pick: ({ text }) => {
    for (const candidate of scan(text)) {
      return candidate.value;
    }
    return null;
  },
};

export const largestNonYear: StatsStrategy = {
  name: StrategyName.LargestNonYear,
  pick: ({ text }) => {
    let best: Candidate | null = null;
    for (const candidate of scan(text)) {
      if (looksLikeYear(candidate.value)) continue;
      if (best === null || candidate.value > best.value) {
        best = candidate;
      }
    }
    return best?.value ?? null;
  },
};

export const TEXT_STRATEGIES: readonly StatsStrategy[] = [firstCandidate, largestNonYear];
export const FRAGMENT_STRATEGIES: readonly StatsStrategy[] = [
  dataCountAttribute,
  ...TEXT_STRATEGIES,
];

export const pickFirst = (
  input: ExtractionInput,
  strategies: readonly StatsStrategy[]
): StrategyMatch | null => {
  for (const strategy of strategies) {
    const value = strategy.pick(input);
    if (value !== null) {
      return { strategy: strategy.name, value };
    }
  }
  return null;
};

export const choose = (text: string): number | null =>
  pickFirst({ text }, TEXT_STRATEGIES)?.value ?? null;
