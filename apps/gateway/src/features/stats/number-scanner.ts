export interface Candidate {
  value: number;
  position: number;
}

// Grouped form first ("1,142", "1.142", "1 142"). The leading group must end
// its digit run, otherwise the whole run is one token so "2024" is never split.
const NUMBER_TOKEN = /\d{1,3}(?!\d)(?:[,.\s]\d{3})*|\d+/g;
const SEPARATORS = /[,.\s]/g;
const DIGITS_ONLY = /^\d+$/;

export const parseNumberToken = (token: string): number | null => {
  const cleaned = token.replace(SEPARATORS, '');
  if (!DIGITS_ONLY.test(cleaned)) {
    return null;
  }

  return Number.parseInt(cleaned, 10);
};

/**
 * Yields every parsable number token in text order. Each call to the returned
 * iterable's iterator restarts the scan from the beginning.
 */
export const scan = (text: string): Iterable<Candidate> => ({
  *[Symbol.iterator]() {
    for (const match of text.matchAll(NUMBER_TOKEN)) {
      const value = parseNumberToken(match[0] ?? '');
      if (value === null) continue;
      yield { value, position: match.index ?? 0 };
    }
  },
});
