export const MAX_STATS_VALUE = 1_000_000_000_000;

export const sanitize = (raw: number, ceiling: number = MAX_STATS_VALUE): number | null => {
  if (!Number.isSafeInteger(raw)) {
    return null;
  }

  if (raw < 0 || raw > ceiling) {
    return null;
  }

  return raw;
};
