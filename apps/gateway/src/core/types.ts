import type { StatsValue } from './branded-types.js';

export interface ExtractRequest {
  html: string;
}

export interface ExtractResponse {
  value: number | null;
  cached: boolean;
}

export type InterceptResult =
  | { transformed: true; value: StatsValue }
  | { transformed: false; html: string };

export enum StrategyName {
  DataCountAttribute = 'data-count-attribute',
  FirstCandidate = 'first-candidate',
  LargestNonYear = 'largest-non-year',
}

export interface StrategyMatch {
  strategy: StrategyName;
  value: number;
}

export interface ExtractionOutcome {
  value: StatsValue | null;
  cached: boolean;
  strategy?: StrategyName;
}

export type InvalidationReason = 'settings-change' | 'uninstall' | 'manual';

export interface InvalidateRequest {
  reason: InvalidationReason;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: number;
  cache: {
    size: number;
    maxSize: number;
    ttlMs: number;
  };
}
