import { auditNulls, runReport as runNamedReport } from "@reelclean/analyze";
import {
  backupTable,
  dedupTable,
  imputeMissing,
  normalizeRecord,
  normalizeTable,
} from "@reelclean/clean";
import {
  DEFAULT_IMPUTATION,
  type ImputationRules,
  type RawTitleRecord,
  type ReportParams,
  type ReportResult,
  type StageName,
  type StageRecord,
  type TitleRecord,
} from "@reelclean/core";
import type { StateDatabase } from "../state/database";
import {
  clearTable,
  completeStage,
  countRows,
  createDedupIndexes,
  getCompletedStages,
  getStages,
  readRawTitles,
  readTitles,
  resetStages,
  writeRawTitles,
  writeTitles,
} from "../state/queries";
import { TITLE_TABLES } from "../state/schema";
import {
  STAGES,
  STAGE_ORDER,
  StageOrderError,
  assertCanRun,
  assertReportable,
  getStageDefinition,
  stagesFrom,
} from "./stages";

export interface PipelineConfig {
  stateDb: StateDatabase;
  imputation?: ImputationRules;
  onProgress?: (stage: string, current: number, total: number, message?: string) => void;
}

export interface StageOutcome {
  stage: StageName;
  rowCount: number;
  details: Record<string, number>;
}

const PROGRESS_INTERVAL = 1000;

function runStage(
  config: PipelineConfig,
  stage: StageName,
  work: () => Omit<StageOutcome, "stage">
): StageOutcome {
  const db = config.stateDb;
  assertCanRun(getCompletedStages(db), stage);

  const run = db.transaction(() => {
    const result = work();
    completeStage(db, stage, result.rowCount, result.details);
    return result;
  });

  return { stage, ...run() };
}

function reportEvery<T>(
  config: PipelineConfig,
  stage: StageName,
  rows: readonly T[],
  visit: (row: T) => void
): void {
  const total = rows.length;

  rows.forEach((row, index) => {
    visit(row);
    const current = index + 1;
    if (current % PROGRESS_INTERVAL === 0 || current === total) {
      config.onProgress?.(stage, current, total);
    }
  });
}

export function runIngest(config: PipelineConfig, records: readonly RawTitleRecord[]): StageOutcome {
  return runStage(config, STAGES.INGEST, () => {
    writeRawTitles(config.stateDb, records);
    config.onProgress?.(STAGES.INGEST, records.length, records.length);
    return { rowCount: records.length, details: { rows: records.length } };
  });
}

export function runNormalize(config: PipelineConfig): StageOutcome {
  return runStage(config, STAGES.NORMALIZE, () => {
    const raw = readRawTitles(config.stateDb);
    const typed: TitleRecord[] = [];

    reportEvery(config, STAGES.NORMALIZE, raw, (row) => {
      typed.push(normalizeRecord(row));
    });

    writeTitles(config.stateDb, TITLE_TABLES.CLEAN, typed);
    const { nullDateAdded, nullReleaseYear } = auditNulls(typed);

    return { rowCount: typed.length, details: { nullDateAdded, nullReleaseYear } };
  });
}

export function runImpute(config: PipelineConfig): StageOutcome {
  return runStage(config, STAGES.IMPUTE, () => {
    const rows = readTitles(config.stateDb, TITLE_TABLES.CLEAN);
    const counts = imputeMissing(rows, config.imputation ?? DEFAULT_IMPUTATION);

    writeTitles(config.stateDb, TITLE_TABLES.CLEAN, rows);
    config.onProgress?.(STAGES.IMPUTE, rows.length, rows.length);

    const details: Record<string, number> = {};
    for (const [field, count] of Object.entries(counts)) {
      if (count !== undefined) details[field] = count;
    }

    return { rowCount: rows.length, details };
  });
}

export function runBackup(config: PipelineConfig): StageOutcome {
  return runStage(config, STAGES.BACKUP, () => {
    const backup = backupTable(readTitles(config.stateDb, TITLE_TABLES.CLEAN));

    writeTitles(config.stateDb, TITLE_TABLES.BACKUP, backup);
    config.onProgress?.(STAGES.BACKUP, backup.length, backup.length);

    return { rowCount: backup.length, details: { rows: backup.length } };
  });
}

export function runDedup(config: PipelineConfig): StageOutcome {
  return runStage(config, STAGES.DEDUP, () => {
    const backupRows = countRows(config.stateDb, TITLE_TABLES.BACKUP);
    const { rows, removed } = dedupTable(readTitles(config.stateDb, TITLE_TABLES.CLEAN));

    if (rows.length > backupRows) {
      throw new Error(
        `Deduplicated table has ${rows.length} rows but the backup has ${backupRows}; ${TITLE_TABLES.CLEAN} changed after backup`
      );
    }

    writeTitles(config.stateDb, TITLE_TABLES.DEDUP, rows);
    createDedupIndexes(config.stateDb);
    config.onProgress?.(STAGES.DEDUP, rows.length, rows.length, `${removed} duplicates removed`);

    return { rowCount: rows.length, details: { removed, backupRows } };
  });
}

/** Runs all five stages in order on a fresh state database. */
export function runAll(config: PipelineConfig, records: readonly RawTitleRecord[]): StageOutcome[] {
  return [
    runIngest(config, records),
    runNormalize(config),
    runImpute(config),
    runBackup(config),
    runDedup(config),
  ];
}

export function loadReportRows(db: StateDatabase): TitleRecord[] {
  assertReportable(getCompletedStages(db));
  return readTitles(db, TITLE_TABLES.DEDUP);
}

export function runReport(
  db: StateDatabase,
  name: string,
  params: ReportParams = {}
): ReportResult {
  return runNamedReport(name, loadReportRows(db), params);
}

export interface AuditResult {
  rawRows: number;
  cleanRows: number;
  backupRows: number;
  dedupRows: number;
  nullDateAdded: number;
  nullReleaseYear: number;
}

/** Row counts per stage table plus parse failures in the clean table. */
export function runAudit(db: StateDatabase): AuditResult {
  const completed = getCompletedStages(db);
  if (!completed.has(STAGES.NORMALIZE)) {
    throw new StageOrderError(
      `Audit requires "${STAGES.NORMALIZE}" to complete first`,
      "report",
      STAGES.NORMALIZE
    );
  }

  const { nullDateAdded, nullReleaseYear } = auditNulls(readTitles(db, TITLE_TABLES.CLEAN));

  return {
    rawRows: countRows(db, TITLE_TABLES.RAW),
    cleanRows: countRows(db, TITLE_TABLES.CLEAN),
    backupRows: countRows(db, TITLE_TABLES.BACKUP),
    dedupRows: countRows(db, TITLE_TABLES.DEDUP),
    nullDateAdded,
    nullReleaseYear,
  };
}

export function getPipelineStatus(db: StateDatabase): StageRecord[] {
  return getStages(db);
}

/**
 * Marks `from` and every later stage pending and empties the tables they created.
 * Resetting impute alone rebuilds the clean table from the raw rows, since impute
 * rewrites it in place.
 */
export function resetPipeline(db: StateDatabase, from: StageName = STAGE_ORDER[0]): StageName[] {
  const stages = stagesFrom(from);
  const completed = getCompletedStages(db);

  const reset = db.transaction(() => {
    for (const stage of stages) {
      const { creates } = getStageDefinition(stage);
      if (creates) clearTable(db, creates);
    }

    if (from === STAGES.IMPUTE && completed.has(STAGES.NORMALIZE)) {
      writeTitles(db, TITLE_TABLES.CLEAN, normalizeTable(readRawTitles(db)));
    }

    resetStages(db, stages);
  });

  reset();
  return stages;
}
