import { CATEGORIES, type NullAudit, type ReportResult, type TitleRecord } from "@reelclean/core";
import { countBy, countDistinct, rankByCount } from "./aggregate";
import { topTokens } from "./tokenizer";

export interface TitleSummary {
  totalTitles: number;
  totalMovies: number;
  totalShows: number;
  uniqueCountries: number;
  uniqueDirectors: number;
}

export interface DurationCount {
  type: string;
  duration: string;
  count: number;
}

export function countByCategory(rows: readonly TitleRecord[]): ReportResult {
  const ranked = rankByCount(countBy(rows, (r) => r.type));

  return {
    name: "category_counts",
    columns: ["type", "count"],
    rows: ranked.map(([type, count]) => ({ type, count })),
  };
}

export function topCountries(rows: readonly TitleRecord[], limit = 10): ReportResult {
  const ranked = rankByCount(countBy(rows, (r) => r.country), limit);

  return {
    name: "top_countries",
    columns: ["country", "count"],
    rows: ranked.map(([country, count]) => ({ country, count })),
  };
}

export function yearlyTrend(rows: readonly TitleRecord[]): ReportResult {
  const years = [...countBy(rows, (r) => r.releaseYear).entries()].sort((a, b) => a[0] - b[0]);

  return {
    name: "yearly_trend",
    columns: ["release_year", "count"],
    rows: years.map(([year, count]) => ({ release_year: year, count })),
  };
}

export function durationCounts(rows: readonly TitleRecord[], limit = 30): DurationCount[] {
  const groups = new Map<string, DurationCount>();

  for (const row of rows) {
    if (row.type === null || row.duration === null) continue;

    const key = JSON.stringify([row.type, row.duration]);
    const group = groups.get(key);
    if (group) {
      group.count++;
    } else {
      groups.set(key, { type: row.type, duration: row.duration, count: 1 });
    }
  }

  return [...groups.values()].sort((a, b) => b.count - a.count).slice(0, limit);
}

export function durationDistribution(rows: readonly TitleRecord[], limit = 30): ReportResult {
  return {
    name: "duration_distribution",
    columns: ["type", "duration", "count"],
    rows: durationCounts(rows, limit).map(({ type, duration, count }) => ({ type, duration, count })),
  };
}

export function ratingDistribution(rows: readonly TitleRecord[]): ReportResult {
  const ranked = rankByCount(countBy(rows, (r) => r.rating));

  return {
    name: "rating_distribution",
    columns: ["rating", "count"],
    rows: ranked.map(([rating, count]) => ({ rating, count })),
  };
}

export function topCast(rows: readonly TitleRecord[], limit = 20): ReportResult {
  return {
    name: "top_cast",
    columns: ["actor", "count"],
    rows: topTokens(rows.map((r) => r.cast), limit).map(({ token, count }) => ({ actor: token, count })),
  };
}

export function topGenres(rows: readonly TitleRecord[], limit = 20): ReportResult {
  return {
    name: "top_genres",
    columns: ["genre", "count"],
    rows: topTokens(rows.map((r) => r.listedIn), limit).map(({ token, count }) => ({ genre: token, count })),
  };
}

export function summarize(rows: readonly TitleRecord[]): TitleSummary {
  const categories = countBy(rows, (r) => r.type);

  return {
    totalTitles: rows.length,
    totalMovies: categories.get(CATEGORIES.MOVIE) ?? 0,
    totalShows: categories.get(CATEGORIES.TV_SHOW) ?? 0,
    uniqueCountries: countDistinct(rows, (r) => r.country),
    uniqueDirectors: countDistinct(rows, (r) => r.director),
  };
}

export function summary(rows: readonly TitleRecord[]): ReportResult {
  const s = summarize(rows);

  return {
    name: "summary",
    columns: ["total_titles", "total_movies", "total_shows", "unique_countries", "unique_directors"],
    rows: [
      {
        total_titles: s.totalTitles,
        total_movies: s.totalMovies,
        total_shows: s.totalShows,
        unique_countries: s.uniqueCountries,
        unique_directors: s.uniqueDirectors,
      },
    ],
  };
}

export function auditNulls(rows: readonly TitleRecord[]): NullAudit {
  let nullDateAdded = 0;
  let nullReleaseYear = 0;

  for (const row of rows) {
    if (row.dateAdded === null) nullDateAdded++;
    if (row.releaseYear === null) nullReleaseYear++;
  }

  return { total: rows.length, nullDateAdded, nullReleaseYear };
}

export function nullAudit(rows: readonly TitleRecord[]): ReportResult {
  const audit = auditNulls(rows);

  return {
    name: "null_audit",
    columns: ["total", "null_date_added", "null_release_year"],
    rows: [
      {
        total: audit.total,
        null_date_added: audit.nullDateAdded,
        null_release_year: audit.nullReleaseYear,
      },
    ],
  };
}
