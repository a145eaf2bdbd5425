export type StageName = "ingest" | "normalize" | "impute" | "backup" | "dedup";

export type StageStatus = "pending" | "complete";

export interface StageRecord {
  stage: StageName;
  status: StageStatus;
  rowCount: number | null;
  details: Record<string, number> | null;
  completedAt: string | null;
}

export interface NullAudit {
  total: number;
  nullDateAdded: number;
  nullReleaseYear: number;
}
