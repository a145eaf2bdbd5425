import { type ReportDefinition, listReports } from "@reelclean/analyze";
import type { ReportResult } from "@reelclean/core";
import { runReport } from "@reelclean/orchestrator";
import { z } from "zod";
import type { ServerState } from "../data/loader";

export const runReportInput = z.object({
  name: z.string().min(1),
  limit: z.number().int().positive().optional(),
});

export type RunReportInput = z.infer<typeof runReportInput>;

export interface ListReportsOutput {
  reports: Omit<ReportDefinition, "run">[];
}

export interface RunReportOutput {
  report: ReportResult;
  rowCount: number;
}

export function listAvailableReports(): ListReportsOutput {
  return { reports: listReports() };
}

export function runNamedReport(state: ServerState, input: RunReportInput): RunReportOutput {
  const report = runReport(state.db, input.name, { limit: input.limit ?? state.reportLimit });
  return { report, rowCount: report.rows.length };
}
