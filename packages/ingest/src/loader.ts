import { readFile } from "node:fs/promises";
import { CSV_HEADERS, type RawTitleRecord, TITLE_FIELDS, type TitleField } from "@reelclean/core";
import { parse } from "csv-parse/sync";

export interface LoadResult {
  records: RawTitleRecord[];
  headers: string[];
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

function resolveColumns(headers: string[]): Record<TitleField, number> {
  const normalized = headers.map((h) => h.trim().toLowerCase());
  const missing: string[] = [];
  const columns: Partial<Record<TitleField, number>> = {};

  for (const field of TITLE_FIELDS) {
    const index = normalized.indexOf(CSV_HEADERS[field]);
    if (index === -1) {
      missing.push(CSV_HEADERS[field]);
    } else {
      columns[field] = index;
    }
  }

  if (missing.length > 0) {
    throw new Error(`Invalid titles CSV: missing columns ${missing.join(", ")}`);
  }

  return {
    showId: columns.showId ?? 0,
    type: columns.type ?? 0,
    title: columns.title ?? 0,
    director: columns.director ?? 0,
    cast: columns.cast ?? 0,
    country: columns.country ?? 0,
    dateAdded: columns.dateAdded ?? 0,
    releaseYear: columns.releaseYear ?? 0,
    rating: columns.rating ?? 0,
    duration: columns.duration ?? 0,
    listedIn: columns.listedIn ?? 0,
    description: columns.description ?? 0,
  };
}

function toRecord(row: string[], columns: Record<TitleField, number>): RawTitleRecord {
  const cell = (field: TitleField): string => row[columns[field]] ?? "";

  return {
    showId: cell("showId"),
    type: cell("type"),
    title: cell("title"),
    director: cell("director"),
    cast: cell("cast"),
    country: cell("country"),
    dateAdded: cell("dateAdded"),
    releaseYear: cell("releaseYear"),
    rating: cell("rating"),
    duration: cell("duration"),
    listedIn: cell("listedIn"),
    description: cell("description"),
  };
}

/**
 * Cells are kept verbatim: no trimming and no type conversion. Empty cells
 * load as empty strings.
 */
export function parseTitlesCsv(content: string | Buffer): LoadResult {
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!isStringMatrix(parsed)) {
    throw new Error("Invalid titles CSV: expected rows of text cells");
  }

  const [headers, ...rows] = parsed;
  if (!headers) {
    throw new Error("Invalid titles CSV: missing header row");
  }

  const columns = resolveColumns(headers);

  return {
    records: rows.map((row) => toRecord(row, columns)),
    headers,
  };
}

export async function loadTitlesCsv(path: string): Promise<LoadResult> {
  try {
    const content = await readFile(path);
    return parseTitlesCsv(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load titles from ${path}: ${message}`, { cause: error });
  }
}
