import type { Result, SearchWindow } from "../types";

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export class DateParseError extends Error {
  constructor(readonly input: string, readonly expected: string) {
    super(`Cannot parse "${input}" as ${expected}`);
    this.name = "DateParseError";
  }
}

function isLeapYear(year: number) {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number) {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isValidDate({ year, month, day }: CalendarDate) {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** Parses the portal/checkpoint form `YYYYMMDD`. */
export function parseCompactDate(text: string): Result<CalendarDate, DateParseError> {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(text.trim());
  if (match) {
    const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
    if (isValidDate(date)) return { ok: true, value: date };
  }
  return { ok: false, error: new DateParseError(text, "YYYYMMDD") };
}

export function formatCompactDate({ year, month, day }: CalendarDate) {
  return `${pad(year, 4)}${pad(month)}${pad(day)}`;
}

export function formatIsoDate({ year, month, day }: CalendarDate) {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function compareDates(a: CalendarDate, b: CalendarDate) {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Parses the results table's "Recorded Date" column (`M/D/YYYY`, one or two
 * digit month and day).
 */
export function parseRecordedDate(text: string): Result<CalendarDate, DateParseError> {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (match) {
    const date = { year: Number(match[3]), month: Number(match[1]), day: Number(match[2]) };
    if (isValidDate(date)) return { ok: true, value: date };
  }
  return { ok: false, error: new DateParseError(text, "MM/DD/YYYY") };
}

/**
 * Start of the search window ending at `endDate`: the same day `windowYears`
 * earlier, never before `minStartDate`. Feb 29 landing on a non-leap year
 * becomes Feb 28. An unreadable end date, or one before `minStartDate`,
 * searches from `minStartDate`.
 */
export function deriveWindowStart(endDate: string, windowYears: number, minStartDate: string): string {
  const end = parseCompactDate(endDate);
  const min = parseCompactDate(minStartDate);
  if (!min.ok) throw min.error;
  if (!end.ok || compareDates(end.value, min.value) < 0) return formatCompactDate(min.value);

  let candidate: CalendarDate = { ...end.value, year: end.value.year - windowYears };
  if (!isValidDate(candidate)) {
    candidate = { ...candidate, day: 28 };
  }
  if (compareDates(candidate, min.value) < 0) {
    candidate = min.value;
  }
  return formatCompactDate(candidate);
}

/** The end date is raised to `minStartDate` if it falls before it. */
export function deriveWindow(endDate: string, windowYears: number, minStartDate: string): SearchWindow {
  const startDate = deriveWindowStart(endDate, windowYears, minStartDate);
  return { startDate, endDate: endDate < startDate ? startDate : endDate };
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date) {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
