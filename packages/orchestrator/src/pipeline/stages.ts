import type { StageName } from "@reelclean/core";
import type { TitleTable } from "../state/schema";

export interface Stage {
  name: StageName;
  prerequisite: StageName | null;
  /** Table this stage fills from scratch; impute rewrites the normalize output in place. */
  creates: TitleTable | null;
}

export const STAGES = {
  INGEST: "ingest",
  NORMALIZE: "normalize",
  IMPUTE: "impute",
  BACKUP: "backup",
  DEDUP: "dedup",
} as const;

export const STAGE_DEFINITIONS: readonly Stage[] = [
  { name: STAGES.INGEST, prerequisite: null, creates: "titles_raw" },
  { name: STAGES.NORMALIZE, prerequisite: STAGES.INGEST, creates: "titles_clean" },
  { name: STAGES.IMPUTE, prerequisite: STAGES.NORMALIZE, creates: null },
  { name: STAGES.BACKUP, prerequisite: STAGES.IMPUTE, creates: "titles_clean_backup" },
  { name: STAGES.DEDUP, prerequisite: STAGES.BACKUP, creates: "titles_clean_dedup" },
];

export const STAGE_ORDER: readonly StageName[] = STAGE_DEFINITIONS.map((s) => s.name);

export class StageOrderError extends Error {
  constructor(
    message: string,
    readonly stage: StageName | "report",
    readonly prerequisite: StageName | null
  ) {
    super(message);
    this.name = "StageOrderError";
  }
}

export function isStageName(value: string): value is StageName {
  return STAGE_ORDER.some((stage) => stage === value);
}

export function getStageDefinition(stage: StageName): Stage {
  const definition = STAGE_DEFINITIONS.find((s) => s.name === stage);
  if (!definition) {
    throw new Error(`Unknown stage: ${stage}`);
  }
  return definition;
}

export function assertCanRun(completed: ReadonlySet<StageName>, stage: StageName): void {
  if (completed.has(stage)) {
    throw new StageOrderError(
      `Stage "${stage}" has already completed; reset it before running it again`,
      stage,
      null
    );
  }

  const { prerequisite } = getStageDefinition(stage);
  if (prerequisite && !completed.has(prerequisite)) {
    throw new StageOrderError(
      `Stage "${stage}" requires "${prerequisite}" to complete first`,
      stage,
      prerequisite
    );
  }
}

export function assertReportable(completed: ReadonlySet<StageName>): void {
  if (!completed.has(STAGES.DEDUP)) {
    throw new StageOrderError(
      `Reports require "${STAGES.DEDUP}" to complete first`,
      "report",
      STAGES.DEDUP
    );
  }
}

/** The given stage and every stage after it. */
export function stagesFrom(stage: StageName): StageName[] {
  return STAGE_ORDER.slice(STAGE_ORDER.indexOf(stage));
}

export function nextStage(completed: ReadonlySet<StageName>): StageName | null {
  return STAGE_ORDER.find((stage) => !completed.has(stage)) ?? null;
}
