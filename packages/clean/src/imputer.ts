import {
  DEFAULT_IMPUTATION,
  type ImputationRules,
  TEXT_FIELDS,
  type TextField,
  type TitleRecord,
  isBlank,
} from "@reelclean/core";

export type ImputationCounts = Partial<Record<TextField, number>>;

/**
 * Replaces null or whitespace-only values with each field's default.
 * Mutates the given rows.
 */
export function imputeMissing(
  rows: TitleRecord[],
  rules: ImputationRules = DEFAULT_IMPUTATION
): ImputationCounts {
  const entries: [TextField, string][] = [];
  const counts: ImputationCounts = {};

  for (const field of TEXT_FIELDS) {
    const fallback = rules[field];
    if (fallback === undefined) continue;
    entries.push([field, fallback]);
    counts[field] = 0;
  }

  for (const row of rows) {
    for (const [field, fallback] of entries) {
      if (isBlank(row[field])) {
        row[field] = fallback;
        counts[field] = (counts[field] ?? 0) + 1;
      }
    }
  }

  return counts;
}
