import { LIST_DELIMITER } from "@reelclean/core";
import { rankByCount } from "./aggregate";

export interface TokenCount {
  token: string;
  count: number;
}

/**
 * Splits a delimited list into trimmed, non-empty tokens. A value with n
 * delimiters yields at most n + 1 tokens; repeats are kept.
 */
export function tokenizeList(value: string | null, delimiter = LIST_DELIMITER): string[] {
  if (value === null || value === "") return [];

  return value
    .split(delimiter)
    .map((token) => token.trim())
    .filter((token) => token !== "");
}

/** Occurrences per token, keyed in first-encountered order. */
export function countTokens(
  values: Iterable<string | null>,
  delimiter = LIST_DELIMITER
): Map<string, number> {
  const counts = new Map<string, number>();

  for (const value of values) {
    for (const token of tokenizeList(value, delimiter)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  return counts;
}

export function topTokens(
  values: Iterable<string | null>,
  limit: number,
  delimiter = LIST_DELIMITER
): TokenCount[] {
  return rankByCount(countTokens(values, delimiter), limit).map(([token, count]) => ({
    token,
    count,
  }));
}
