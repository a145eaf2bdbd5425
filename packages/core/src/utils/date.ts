import type { CalendarDate } from "../types/title";
import { normalizeWhitespace } from "./text";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const MONTH_DAY_YEAR = /^([a-z]+) (\d{1,2}), ?(\d{4})$/i;

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatCalendarDate(year: number, month: number, day: number): CalendarDate {
  const mm = String(month).padStart(2, "0");
  const dd = String(day).padStart(2, "0");
  return `${String(year).padStart(4, "0")}-${mm}-${dd}`;
}

/**
 * Parses dates written as `"September 9, 2019"`.
 * Anything that is not a real calendar date in that shape yields null.
 */
export function parseMonthDayYear(value: string | null): CalendarDate | null {
  if (value === null) return null;

  const match = MONTH_DAY_YEAR.exec(normalizeWhitespace(value));
  if (!match) return null;

  const [, monthName, dayText, yearText] = match;
  const month = MONTHS.indexOf(monthName.toLowerCase()) + 1;
  if (month === 0) return null;

  const year = Number.parseInt(yearText, 10);
  const day = Number.parseInt(dayText, 10);
  if (year === 0 || day < 1 || day > daysInMonth(year, month)) return null;

  return formatCalendarDate(year, month, day);
}

/** Leading integer of the text; empty, non-numeric and zero all mean "no year". */
export function parseYear(value: string | null): number | null {
  if (value === null) return null;

  const year = Number.parseInt(value.trim(), 10);
  if (Number.isNaN(year) || year === 0) return null;

  return year;
}
