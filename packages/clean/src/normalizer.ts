import { type RawTitleRecord, type TitleRecord, parseMonthDayYear, parseYear } from "@reelclean/core";

export function normalizeRecord(raw: RawTitleRecord): TitleRecord {
  return {
    showId: raw.showId,
    type: raw.type,
    title: raw.title,
    director: raw.director,
    cast: raw.cast,
    country: raw.country,
    dateAdded: parseMonthDayYear(raw.dateAdded),
    releaseYear: parseYear(raw.releaseYear),
    rating: raw.rating,
    duration: raw.duration,
    listedIn: raw.listedIn,
    description: raw.description,
  };
}

export function normalizeTable(rows: readonly RawTitleRecord[]): TitleRecord[] {
  return rows.map(normalizeRecord);
}
