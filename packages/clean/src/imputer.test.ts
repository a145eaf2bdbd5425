import { SENTINEL, type TitleRecord } from "@reelclean/core";
import { describe, expect, test } from "vitest";
import { imputeMissing } from "./imputer";

function createTitle(overrides: Partial<TitleRecord> = {}): TitleRecord {
  return {
    showId: "s1",
    type: "Movie",
    title: "Harbor Lights",
    director: "Mara Quinn",
    cast: "Tom, Jerry",
    country: "Ireland",
    dateAdded: "2019-09-09",
    releaseYear: 2019,
    rating: "PG-13",
    duration: "104 min",
    listedIn: "Dramas, Independent Movies",
    description: "A lighthouse keeper takes in a stranger.",
    ...overrides,
  };
}

describe("imputeMissing", () => {
  test("replaces empty and null director with the sentinel", () => {
    const rows = [createTitle({ director: "" }), createTitle({ director: null })];

    imputeMissing(rows);

    expect(rows[0].director).toBe(SENTINEL);
    expect(rows[1].director).toBe("Unknown");
  });

  test("replaces whitespace-only country", () => {
    const rows = [createTitle({ country: "   " })];

    imputeMissing(rows);

    expect(rows[0].country).toBe("Unknown");
  });

  test("leaves present values alone, including sentinel-like text", () => {
    const rows = [createTitle({ director: "Unknown Director", country: " France " })];

    imputeMissing(rows);

    expect(rows[0].director).toBe("Unknown Director");
    expect(rows[0].country).toBe(" France ");
  });

  test("only touches fields named in the rules", () => {
    const rows = [createTitle({ cast: null, rating: "", director: "" })];

    imputeMissing(rows);

    expect(rows[0].cast).toBeNull();
    expect(rows[0].rating).toBe("");
  });

  test("mutates rows in place", () => {
    const row = createTitle({ director: "" });
    const rows = [row];

    imputeMissing(rows);

    expect(rows[0]).toBe(row);
    expect(row.director).toBe("Unknown");
  });

  test("returns replacement counts per field", () => {
    const rows = [
      createTitle({ director: "", country: null }),
      createTitle({ director: null }),
      createTitle(),
    ];

    expect(imputeMissing(rows)).toEqual({ director: 2, country: 1 });
  });

  test("applies custom rules", () => {
    const rows = [createTitle({ cast: "", rating: " " })];

    const counts = imputeMissing(rows, { cast: "No Cast", rating: "NR" });

    expect(rows[0].cast).toBe("No Cast");
    expect(rows[0].rating).toBe("NR");
    expect(counts).toEqual({ cast: 1, rating: 1 });
  });
});
