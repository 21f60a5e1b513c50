export type CacheKey = string & { __brand: 'CacheKey' };
export type StatsValue = number & { __brand: 'StatsValue' };

export const createCacheKey = (key: string): CacheKey => key as CacheKey;
export const createStatsValue = (value: number): StatsValue => value as StatsValue;
