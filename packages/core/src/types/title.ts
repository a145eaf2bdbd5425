export type TitleCategory = "Movie" | "TV Show";

export type TitleField =
  | "showId"
  | "type"
  | "title"
  | "director"
  | "cast"
  | "country"
  | "dateAdded"
  | "releaseYear"
  | "rating"
  | "duration"
  | "listedIn"
  | "description";

/** A row as it arrives from the loader: every cell is text. */
export type RawTitleRecord = Record<TitleField, string | null>;

/** ISO `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface TitleRecord {
  showId: string | null;
  type: string | null;
  title: string | null;
  director: string | null;
  cast: string | null;
  country: string | null;
  dateAdded: CalendarDate | null;
  releaseYear: number | null;
  rating: string | null;
  duration: string | null;
  listedIn: string | null;
  description: string | null;
}

export type TextField = {
  [K in TitleField]: TitleRecord[K] extends string | null ? K : never;
}[TitleField];
