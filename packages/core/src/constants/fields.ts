import type { TextField, TitleCategory, TitleField } from "../types/title";

export const TITLE_FIELDS: readonly TitleField[] = [
  "showId",
  "type",
  "title",
  "director",
  "cast",
  "country",
  "dateAdded",
  "releaseYear",
  "rating",
  "duration",
  "listedIn",
  "description",
];

export const TEXT_FIELDS: readonly TextField[] = [
  "showId",
  "type",
  "title",
  "director",
  "cast",
  "country",
  "dateAdded",
  "rating",
  "duration",
  "listedIn",
  "description",
];

/** Header names used by the source CSV export. */
export const CSV_HEADERS: Record<TitleField, string> = {
  showId: "show_id",
  type: "type",
  title: "title",
  director: "director",
  cast: "cast",
  country: "country",
  dateAdded: "date_added",
  releaseYear: "release_year",
  rating: "rating",
  duration: "duration",
  listedIn: "listed_in",
  description: "description",
};

export const CATEGORIES = {
  MOVIE: "Movie",
  TV_SHOW: "TV Show",
} as const satisfies Record<string, TitleCategory>;

export const SENTINEL = "Unknown";

export type ImputationRules = Partial<Record<TextField, string>>;

export const DEFAULT_IMPUTATION: ImputationRules = {
  director: SENTINEL,
  country: SENTINEL,
};

export const LIST_DELIMITER = ",";
