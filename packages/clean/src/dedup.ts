import { TITLE_FIELDS, type TitleRecord } from "@reelclean/core";

export interface DedupResult {
  rows: TitleRecord[];
  removed: number;
}

/** Full-row identity: every field in column order, null kept distinct from "". */
export function rowIdentity(row: TitleRecord): string {
  return JSON.stringify(TITLE_FIELDS.map((field) => row[field]));
}

export function backupTable(rows: readonly TitleRecord[]): TitleRecord[] {
  return rows.map((row) => ({ ...row }));
}

/**
 * Keeps the first row of each full-row equality class, in input order.
 * Rows that share a showId but differ in any other field are all kept.
 */
export function dedupTable(rows: readonly TitleRecord[]): DedupResult {
  const seen = new Set<string>();
  const kept: TitleRecord[] = [];

  for (const row of rows) {
    const identity = rowIdentity(row);
    if (seen.has(identity)) continue;
    seen.add(identity);
    kept.push({ ...row });
  }

  return { rows: kept, removed: rows.length - kept.length };
}
