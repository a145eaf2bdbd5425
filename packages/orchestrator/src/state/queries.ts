import type { RawTitleRecord, StageName, StageRecord, TitleRecord } from "@reelclean/core";
import { STAGE_ORDER } from "../pipeline/stages";
import { StateDatabase, type StateRow } from "./database";
import {
  DEDUP_INDEXES,
  STATE_SCHEMA,
  TITLE_COLUMNS,
  TITLE_TABLES,
  type TitleTable,
  type TypedTitleTable,
} from "./schema";

type TitleColumn = (typeof TITLE_COLUMNS)[number];

type ColumnValues = Record<TitleColumn, string | number | null>;

const COLUMN_LIST = TITLE_COLUMNS.join(", ");

function text(row: StateRow, column: string): string | null {
  const value = row[column];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return null;
}

function integer(row: StateRow, column: string): number | null {
  const value = row[column];
  return typeof value === "number" ? value : null;
}

export async function createStateDatabase(path: string): Promise<StateDatabase> {
  const db = await StateDatabase.open(path);

  const setup = db.transaction(() => {
    db.exec(STATE_SCHEMA);

    const seed = db.prepare("INSERT OR IGNORE INTO pipeline_stages (stage, position) VALUES (?, ?)");
    STAGE_ORDER.forEach((stage, position) => seed.run(stage, position));
  });

  setup();
  return db;
}

export function openStateDatabase(path: string): Promise<StateDatabase> {
  return StateDatabase.open(path, { readonly: true });
}

function parseDetails(json: string | null): Record<string, number> | null {
  if (!json) return null;

  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== "object" || parsed === null) return null;

  const details: Record<string, number> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "number") details[key] = value;
  }
  return details;
}

export function getStage(db: StateDatabase, stage: StageName): StageRecord {
  const row = db
    .prepare("SELECT status, row_count, details, completed_at FROM pipeline_stages WHERE stage = ?")
    .get(stage);

  if (!row) {
    return { stage, status: "pending", rowCount: null, details: null, completedAt: null };
  }

  return {
    stage,
    status: text(row, "status") === "complete" ? "complete" : "pending",
    rowCount: integer(row, "row_count"),
    details: parseDetails(text(row, "details")),
    completedAt: text(row, "completed_at"),
  };
}

export function getStages(db: StateDatabase): StageRecord[] {
  return STAGE_ORDER.map((stage) => getStage(db, stage));
}

export function getCompletedStages(db: StateDatabase): Set<StageName> {
  return new Set(
    getStages(db)
      .filter((s) => s.status === "complete")
      .map((s) => s.stage)
  );
}

export function completeStage(
  db: StateDatabase,
  stage: StageName,
  rowCount: number,
  details: Record<string, number>
): void {
  db.prepare(`
    UPDATE pipeline_stages SET
      status = 'complete',
      row_count = ?,
      details = ?,
      completed_at = datetime('now')
    WHERE stage = ?
  `).run(rowCount, JSON.stringify(details), stage);
}

export function resetStages(db: StateDatabase, stages: readonly StageName[]): void {
  const update = db.prepare(`
    UPDATE pipeline_stages SET
      status = 'pending',
      row_count = NULL,
      details = NULL,
      completed_at = NULL
    WHERE stage = ?
  `);

  for (const stage of stages) {
    update.run(stage);
  }
}

function replaceRows(db: StateDatabase, table: TitleTable, rows: readonly ColumnValues[]): void {
  const insert = db.prepare(
    `INSERT INTO ${table} (${COLUMN_LIST}) VALUES (${TITLE_COLUMNS.map(() => "?").join(", ")})`
  );

  const replace = db.transaction((items: readonly ColumnValues[]) => {
    db.exec(`DELETE FROM ${table}`);
    for (const row of items) {
      insert.run(...TITLE_COLUMNS.map((column) => row[column]));
    }
  });

  replace(rows);
}

function toColumns(record: RawTitleRecord | TitleRecord): ColumnValues {
  return {
    show_id: record.showId,
    type: record.type,
    title: record.title,
    director: record.director,
    cast_members: record.cast,
    country: record.country,
    date_added: record.dateAdded,
    release_year: record.releaseYear,
    rating: record.rating,
    duration: record.duration,
    listed_in: record.listedIn,
    description: record.description,
  };
}

function fromRawRow(row: StateRow): RawTitleRecord {
  return {
    showId: text(row, "show_id"),
    type: text(row, "type"),
    title: text(row, "title"),
    director: text(row, "director"),
    cast: text(row, "cast_members"),
    country: text(row, "country"),
    dateAdded: text(row, "date_added"),
    releaseYear: text(row, "release_year"),
    rating: text(row, "rating"),
    duration: text(row, "duration"),
    listedIn: text(row, "listed_in"),
    description: text(row, "description"),
  };
}

function fromTitleRow(row: StateRow): TitleRecord {
  return {
    showId: text(row, "show_id"),
    type: text(row, "type"),
    title: text(row, "title"),
    director: text(row, "director"),
    cast: text(row, "cast_members"),
    country: text(row, "country"),
    dateAdded: text(row, "date_added"),
    releaseYear: integer(row, "release_year"),
    rating: text(row, "rating"),
    duration: text(row, "duration"),
    listedIn: text(row, "listed_in"),
    description: text(row, "description"),
  };
}

export function writeRawTitles(db: StateDatabase, records: readonly RawTitleRecord[]): void {
  replaceRows(db, TITLE_TABLES.RAW, records.map(toColumns));
}

export function readRawTitles(db: StateDatabase): RawTitleRecord[] {
  return db
    .prepare(`SELECT ${COLUMN_LIST} FROM ${TITLE_TABLES.RAW} ORDER BY rowid`)
    .all()
    .map(fromRawRow);
}

export function writeTitles(
  db: StateDatabase,
  table: TypedTitleTable,
  records: readonly TitleRecord[]
): void {
  replaceRows(db, table, records.map(toColumns));
}

export function readTitles(db: StateDatabase, table: TypedTitleTable): TitleRecord[] {
  return db
    .prepare(`SELECT ${COLUMN_LIST} FROM ${table} ORDER BY rowid`)
    .all()
    .map(fromTitleRow);
}

export function countRows(db: StateDatabase, table: TitleTable): number {
  const row = db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get();
  return row ? (integer(row, "count") ?? 0) : 0;
}

export function clearTable(db: StateDatabase, table: TitleTable): void {
  db.exec(`DELETE FROM ${table}`);
}

export function createDedupIndexes(db: StateDatabase): void {
  db.exec(DEDUP_INDEXES);
}
