import { rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RawTitleRecord } from "@reelclean/core";
import {
  type StateDatabase,
  createStateDatabase,
  openStateDatabase,
  runAll,
} from "@reelclean/orchestrator";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { ServerState } from "./data/loader";
import { TOOLS, type ToolResult, callTool } from "./server";

function createRaw(overrides: Partial<RawTitleRecord> = {}): RawTitleRecord {
  return {
    showId: "s1",
    type: "Movie",
    title: "Harbor Lights",
    director: "Ann Lee",
    cast: "Tom, Jerry",
    country: "Ireland",
    dateAdded: "September 9, 2019",
    releaseYear: "2019",
    rating: "PG-13",
    duration: "104 min",
    listedIn: "Dramas",
    description: "A keeper takes in a stranger.",
    ...overrides,
  };
}

function parse(result: ToolResult): unknown {
  return JSON.parse(result.content[0].text);
}

describe("mcp tools", () => {
  let db: StateDatabase;
  let state: ServerState;

  beforeEach(async () => {
    db = await createStateDatabase(":memory:");
    state = { db, reportLimit: undefined };
  });

  afterEach(() => {
    db.close();
  });

  function runPipeline(): void {
    runAll({ stateDb: db }, [
      createRaw(),
      createRaw({
        showId: "s2",
        type: "TV Show",
        title: "Night Shift",
        director: "",
        cast: "Tom",
        country: "Canada",
        dateAdded: "March 1, 2020",
        releaseYear: "2020",
        rating: "TV-MA",
        duration: "2 Seasons",
        listedIn: "Dramas, Comedies",
      }),
      createRaw(),
    ]);
  }

  test("declares the read-only tools", () => {
    expect(TOOLS.map((t) => t.name)).toEqual(["list_reports", "run_report", "pipeline_status"]);
  });

  test("lists reports with their default limits", () => {
    const result = callTool(state, "list_reports", undefined);

    expect(result.isError).toBeUndefined();
    expect(parse(result)).toMatchObject({
      reports: expect.arrayContaining([
        expect.objectContaining({ name: "top_countries", defaultLimit: 10 }),
        expect.objectContaining({ name: "summary", defaultLimit: null }),
      ]),
    });
  });

  test("runs a report over the deduplicated titles", () => {
    runPipeline();

    const result = callTool(state, "run_report", { name: "category_counts" });

    expect(parse(result)).toEqual({
      report: {
        name: "category_counts",
        columns: ["type", "count"],
        rows: [
          { type: "Movie", count: 1 },
          { type: "TV Show", count: 1 },
        ],
      },
      rowCount: 2,
    });
  });

  test("applies the requested limit", () => {
    runPipeline();

    const result = callTool(state, "run_report", { name: "top_cast", limit: 1 });

    expect(parse(result)).toMatchObject({
      report: { rows: [{ actor: "Tom", count: 2 }] },
      rowCount: 1,
    });
  });

  test("falls back to the configured report limit", () => {
    runPipeline();
    state.reportLimit = 1;

    const result = callTool(state, "run_report", { name: "top_genres" });

    expect(parse(result)).toMatchObject({
      report: { rows: [{ genre: "Dramas", count: 2 }] },
      rowCount: 1,
    });
  });

  test("rejects a non-positive limit", () => {
    runPipeline();

    const result = callTool(state, "run_report", { name: "top_cast", limit: 0 });

    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({
      error: "Invalid arguments for run_report: limit: Number must be greater than 0",
    });
  });

  test("rejects a missing report name", () => {
    const result = callTool(state, "run_report", {});

    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({ error: "Invalid arguments for run_report: name: Required" });
  });

  test("rejects an unknown report", () => {
    runPipeline();

    const result = callTool(state, "run_report", { name: "nope" });

    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({
      error:
        "Unknown report: nope. Available: category_counts, top_countries, yearly_trend, duration_distribution, rating_distribution, top_cast, top_genres, summary, null_audit",
    });
  });

  test("rejects reports before deduplication", () => {
    const result = callTool(state, "run_report", { name: "summary" });

    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({ error: 'Reports require "dedup" to complete first' });
  });

  test("reports pipeline status", () => {
    expect(parse(callTool(state, "pipeline_status", undefined))).toMatchObject({
      nextStage: "ingest",
      reportable: false,
    });

    runPipeline();

    expect(parse(callTool(state, "pipeline_status", undefined))).toMatchObject({
      nextStage: null,
      reportable: true,
      stages: expect.arrayContaining([
        expect.objectContaining({ stage: "dedup", status: "complete", rowCount: 2 }),
      ]),
    });
  });

  test("returns unknown tools as errors", () => {
    const result = callTool(state, "drop_tables", {});

    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({ error: "Unknown tool: drop_tables" });
  });

  test("sees pipeline runs written after the server opened the file", async () => {
    const dbPath = join(tmpdir(), `reelclean-mcp-${process.pid}-${Date.now()}.sqlite`);
    const writer = await createStateDatabase(dbPath);
    const reader = await openStateDatabase(dbPath);

    try {
      const served: ServerState = { db: reader, reportLimit: undefined };
      expect(parse(callTool(served, "pipeline_status", undefined))).toMatchObject({
        reportable: false,
      });

      runAll({ stateDb: writer }, [createRaw()]);

      expect(parse(callTool(served, "pipeline_status", undefined))).toMatchObject({
        nextStage: null,
        reportable: true,
      });
    } finally {
      reader.close();
      writer.close();
      rmSync(dbPath, { force: true });
    }
  });
});
