export const TITLE_TABLES = {
  RAW: "titles_raw",
  CLEAN: "titles_clean",
  BACKUP: "titles_clean_backup",
  DEDUP: "titles_clean_dedup",
} as const;

export type TitleTable = (typeof TITLE_TABLES)[keyof typeof TITLE_TABLES];

export type TypedTitleTable = Exclude<TitleTable, "titles_raw">;

export const TITLE_COLUMNS = [
  "show_id",
  "type",
  "title",
  "director",
  "cast_members",
  "country",
  "date_added",
  "release_year",
  "rating",
  "duration",
  "listed_in",
  "description",
] as const;

function titleTable(name: TitleTable, releaseYearType: "TEXT" | "INTEGER"): string {
  return `
CREATE TABLE IF NOT EXISTS ${name} (
  show_id TEXT,
  type TEXT,
  title TEXT,
  director TEXT,
  cast_members TEXT,
  country TEXT,
  date_added TEXT,
  release_year ${releaseYearType},
  rating TEXT,
  duration TEXT,
  listed_in TEXT,
  description TEXT
);
`;
}

export const STATE_SCHEMA = `
CREATE TABLE IF NOT EXISTS pipeline_stages (
  stage TEXT PRIMARY KEY,
  position INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  row_count INTEGER,
  details TEXT,
  completed_at TEXT
);
${titleTable(TITLE_TABLES.RAW, "TEXT")}
${titleTable(TITLE_TABLES.CLEAN, "INTEGER")}
${titleTable(TITLE_TABLES.BACKUP, "INTEGER")}
${titleTable(TITLE_TABLES.DEDUP, "INTEGER")}
`;

export const DEDUP_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_dedup_type ON titles_clean_dedup(type);
CREATE INDEX IF NOT EXISTS idx_dedup_country ON titles_clean_dedup(country);
CREATE INDEX IF NOT EXISTS idx_dedup_year ON titles_clean_dedup(release_year);
`;
