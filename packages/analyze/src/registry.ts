import type { ReportParams, ReportResult, TitleRecord } from "@reelclean/core";
import {
  countByCategory,
  durationDistribution,
  nullAudit,
  ratingDistribution,
  summary,
  topCast,
  topCountries,
  topGenres,
  yearlyTrend,
} from "./reports";

export const REPORT_NAMES = [
  "category_counts",
  "top_countries",
  "yearly_trend",
  "duration_distribution",
  "rating_distribution",
  "top_cast",
  "top_genres",
  "summary",
  "null_audit",
] as const;

export type ReportName = (typeof REPORT_NAMES)[number];

export interface ReportDefinition {
  name: ReportName;
  description: string;
  defaultLimit: number | null;
  run(rows: readonly TitleRecord[], limit?: number): ReportResult;
}

function truncated(
  report: (rows: readonly TitleRecord[]) => ReportResult
): (rows: readonly TitleRecord[], limit?: number) => ReportResult {
  return (rows, limit) => {
    const result = report(rows);
    return limit === undefined ? result : { ...result, rows: result.rows.slice(0, limit) };
  };
}

export const REPORTS: Record<ReportName, ReportDefinition> = {
  category_counts: {
    name: "category_counts",
    description: "Titles per category (Movie, TV Show)",
    defaultLimit: null,
    run: truncated(countByCategory),
  },
  top_countries: {
    name: "top_countries",
    description: "Countries with the most titles",
    defaultLimit: 10,
    run: (rows, limit = 10) => topCountries(rows, limit),
  },
  yearly_trend: {
    name: "yearly_trend",
    description: "Titles per release year, oldest first",
    defaultLimit: null,
    run: truncated(yearlyTrend),
  },
  duration_distribution: {
    name: "duration_distribution",
    description: "Most common (category, duration) pairs",
    defaultLimit: 30,
    run: (rows, limit = 30) => durationDistribution(rows, limit),
  },
  rating_distribution: {
    name: "rating_distribution",
    description: "Titles per rating code",
    defaultLimit: null,
    run: truncated(ratingDistribution),
  },
  top_cast: {
    name: "top_cast",
    description: "Most frequent cast members",
    defaultLimit: 20,
    run: (rows, limit = 20) => topCast(rows, limit),
  },
  top_genres: {
    name: "top_genres",
    description: "Most frequent genres in listed_in",
    defaultLimit: 20,
    run: (rows, limit = 20) => topGenres(rows, limit),
  },
  summary: {
    name: "summary",
    description: "Totals per category and distinct countries and directors",
    defaultLimit: null,
    run: truncated(summary),
  },
  null_audit: {
    name: "null_audit",
    description: "Rows whose date added or release year could not be parsed",
    defaultLimit: null,
    run: truncated(nullAudit),
  },
};

export function isReportName(name: string): name is ReportName {
  return REPORT_NAMES.some((n) => n === name);
}

export function listReports(): Omit<ReportDefinition, "run">[] {
  return REPORT_NAMES.map((name) => {
    const { description, defaultLimit } = REPORTS[name];
    return { name, description, defaultLimit };
  });
}

export function validateLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) return undefined;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid report limit: ${limit} (expected a positive integer)`);
  }
  return limit;
}

export function runReport(
  name: string,
  rows: readonly TitleRecord[],
  params: ReportParams = {}
): ReportResult {
  if (!isReportName(name)) {
    throw new Error(`Unknown report: ${name}. Available: ${REPORT_NAMES.join(", ")}`);
  }

  return REPORTS[name].run(rows, validateLimit(params.limit));
}
