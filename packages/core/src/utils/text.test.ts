import { describe, expect, test } from "vitest";
import { isBlank, normalizeWhitespace } from "./text";

describe("normalizeWhitespace", () => {
  test("trims leading and trailing whitespace", () => {
    expect(normalizeWhitespace("  hello world  ")).toBe("hello world");
  });

  test("collapses newlines and tabs to spaces", () => {
    expect(normalizeWhitespace("hello\n\nworld\ttest")).toBe("hello world test");
  });

  test("returns empty string for whitespace-only input", () => {
    expect(normalizeWhitespace("   \n\t  ")).toBe("");
  });
});

describe("isBlank", () => {
  test("treats null and undefined as blank", () => {
    expect(isBlank(null)).toBe(true);
    expect(isBlank(undefined)).toBe(true);
  });

  test("treats empty and whitespace-only strings as blank", () => {
    expect(isBlank("")).toBe(true);
    expect(isBlank(" \t ")).toBe(true);
  });

  test("keeps text with content", () => {
    expect(isBlank("Unknown Director")).toBe(false);
    expect(isBlank("  x  ")).toBe(false);
  });
});
