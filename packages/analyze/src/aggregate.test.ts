import { describe, expect, test } from "vitest";
import { countBy, countDistinct, rankByCount } from "./aggregate";

describe("countBy", () => {
  test("counts rows per key in first-seen order", () => {
    const counts = countBy(["b", "a", "b", "c"], (v) => v);

    expect([...counts.entries()]).toEqual([
      ["b", 2],
      ["a", 1],
      ["c", 1],
    ]);
  });

  test("skips null keys", () => {
    const counts = countBy([{ k: "a" }, { k: null }, { k: "a" }], (r) => r.k);

    expect([...counts.entries()]).toEqual([["a", 2]]);
  });

  test("keeps empty string as a key", () => {
    expect(countBy(["", ""], (v) => v).get("")).toBe(2);
  });
});

describe("rankByCount", () => {
  test("sorts descending and keeps ties stable", () => {
    const counts = new Map([
      ["x", 1],
      ["y", 3],
      ["z", 1],
      ["w", 3],
    ]);

    expect(rankByCount(counts)).toEqual([
      ["y", 3],
      ["w", 3],
      ["x", 1],
      ["z", 1],
    ]);
  });

  test("applies the limit after sorting", () => {
    const counts = new Map([
      ["x", 1],
      ["y", 3],
    ]);

    expect(rankByCount(counts, 1)).toEqual([["y", 3]]);
  });
});

describe("countDistinct", () => {
  test("ignores null keys", () => {
    expect(countDistinct(["a", null, "b", "a"], (v) => v)).toBe(2);
  });
});
