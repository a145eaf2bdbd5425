export type ReportValue = string | number | null;

export interface ReportResult {
  name: string;
  columns: string[];
  rows: Record<string, ReportValue>[];
}

export interface ReportParams {
  limit?: number;
}
