import type { TitleRecord } from "@reelclean/core";
import { describe, expect, test } from "vitest";
import { REPORT_NAMES, isReportName, listReports, runReport } from "./registry";

function createTitle(overrides: Partial<TitleRecord> = {}): TitleRecord {
  return {
    showId: "s1",
    type: "Movie",
    title: "Untitled",
    director: "Unknown",
    cast: null,
    country: "Unknown",
    dateAdded: null,
    releaseYear: 2019,
    rating: "TV-MA",
    duration: "90 min",
    listedIn: null,
    description: null,
    ...overrides,
  };
}

const ROWS = [
  createTitle({ showId: "s1", cast: "A, B" }),
  createTitle({ showId: "s2", type: "TV Show", cast: "B, C" }),
  createTitle({ showId: "s3", releaseYear: 2021, cast: "D" }),
];

describe("runReport", () => {
  test("runs a report by name", () => {
    const result = runReport("category_counts", ROWS);

    expect(result.name).toBe("category_counts");
    expect(result.rows).toEqual([
      { type: "Movie", count: 2 },
      { type: "TV Show", count: 1 },
    ]);
  });

  test("passes the limit to top-K reports", () => {
    expect(runReport("top_cast", ROWS, { limit: 1 }).rows).toEqual([{ actor: "B", count: 2 }]);
  });

  test("uses the default limit when none is given", () => {
    expect(runReport("top_cast", ROWS).rows).toHaveLength(4);
  });

  test("truncates reports that have no default limit", () => {
    expect(runReport("yearly_trend", ROWS, { limit: 1 }).rows).toEqual([
      { release_year: 2019, count: 2 },
    ]);
  });

  test("rejects unknown report names", () => {
    expect(() => runReport("top_directors", ROWS)).toThrow("Unknown report: top_directors");
  });

  test("rejects limits that are not positive integers", () => {
    expect(() => runReport("top_cast", ROWS, { limit: 0 })).toThrow("Invalid report limit: 0");
    expect(() => runReport("top_cast", ROWS, { limit: 2.5 })).toThrow("Invalid report limit: 2.5");
  });
});

describe("listReports", () => {
  test("describes every report in order", () => {
    const reports = listReports();

    expect(reports.map((r) => r.name)).toEqual([...REPORT_NAMES]);
    expect(reports.find((r) => r.name === "top_countries")?.defaultLimit).toBe(10);
    expect(reports.find((r) => r.name === "summary")?.defaultLimit).toBeNull();
  });
});

describe("isReportName", () => {
  test("recognizes registered names only", () => {
    expect(isReportName("summary")).toBe(true);
    expect(isReportName("Summary")).toBe(false);
  });
});
