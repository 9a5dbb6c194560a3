// ── Date helpers ──────────────────────────────────────────────────────────────
// Calendar arithmetic on plain { year, month, day } values. Everything runs on
// UTC-based Date math so the host time zone never leaks in.

import type { CalendarDate, TimeOfDay, Weekday } from "../types";

const MS_PER_DAY = 86_400_000;

/** Title-case month abbreviations as printed in exam dates ("01-Dec-2023"). */
export const MONTH_ABBREVIATIONS: Record<string, number> = {
  Jan: 1,
  Feb: 2,
  Mar: 3,
  Apr: 4,
  May: 5,
  Jun: 6,
  Jul: 7,
  Aug: 8,
  Sep: 9,
  Oct: 10,
  Nov: 11,
  Dec: 12,
};

/** ISO day number: Monday = 1 … Sunday = 7. */
export const ISO_WEEKDAY: Record<Weekday, number> = {
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
  Sun: 7,
};

/**
 * Milliseconds since the epoch for a UTC wall-clock time. Unlike `Date.UTC`,
 * years 0-99 stay as given instead of mapping to 1900-1999.
 */
function utcMillis(year: number, month: number, day: number, hour = 0, minute = 0): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hour, minute, 0, 0);
  return d.getTime();
}

function toEpochDay(date: CalendarDate): number {
  return Math.floor(utcMillis(date.year, date.month, date.day) / MS_PER_DAY);
}

function fromEpochDay(epochDay: number): CalendarDate {
  const d = new Date(epochDay * MS_PER_DAY);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

/**
 * Build a calendar date, or null when the parts do not name a real day
 * (e.g. 31 Apr, 29 Feb in a common year).
 */
export function makeDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (month < 1 || month > 12 || day < 1) return null;
  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(utcMillis(year, month + 1, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return { year, month, day };
}

/** Returns a new date n days after the given one (n may be negative). */
export function addDays(date: CalendarDate, n: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + n);
}

/** ISO day number of the given date (Monday = 1 … Sunday = 7). */
export function isoDayOfWeek(date: CalendarDate): number {
  const jsDay = new Date(utcMillis(date.year, date.month, date.day)).getUTCDay();
  return jsDay === 0 ? 7 : jsDay;
}

/** Monday of ISO week 1: the week holding 4 January. */
function isoWeekOneMonday(isoYear: number): number {
  const jan4: CalendarDate = { year: isoYear, month: 1, day: 4 };
  return toEpochDay(jan4) - (isoDayOfWeek(jan4) - 1);
}

/**
 * ISO week-numbering year and week of a date.
 * 1 Jan 2021 (a Friday) → { isoYear: 2020, isoWeek: 53 }.
 */
export function isoWeekOf(date: CalendarDate): { isoYear: number; isoWeek: number } {
  // The Thursday of the same ISO week decides which year the week belongs to
  const thursday = toEpochDay(date) + (4 - isoDayOfWeek(date));
  const isoYear = fromEpochDay(thursday).year;
  const isoWeek = Math.floor((thursday - isoWeekOneMonday(isoYear)) / 7) + 1;
  return { isoYear, isoWeek };
}

/** Number of ISO weeks (52 or 53) in an ISO year. 28 Dec is always in the last one. */
export function isoWeeksInYear(isoYear: number): number {
  return isoWeekOf({ year: isoYear, month: 12, day: 28 }).isoWeek;
}

/**
 * Resolve an ISO (year, week, weekday) triple to a calendar date.
 * Returns null when the week does not exist in that year; nothing wraps
 * into the neighbouring year.
 *
 * Example: isoWeekToDate(2023, 33, "Mon") → 2023-08-14
 */
export function isoWeekToDate(
  isoYear: number,
  isoWeek: number,
  weekday: Weekday,
): CalendarDate | null {
  if (!Number.isInteger(isoWeek) || isoWeek < 1 || isoWeek > isoWeeksInYear(isoYear)) {
    return null;
  }
  const monday = isoWeekOneMonday(isoYear) + (isoWeek - 1) * 7;
  return fromEpochDay(monday + ISO_WEEKDAY[weekday] - 1);
}

/**
 * Interpret date + time as wall-clock time at a fixed UTC offset and return
 * the matching UTC instant.
 *
 * @param offsetMinutes  minutes east of UTC, e.g. 480 for UTC+8
 */
export function toUtcInstant(
  date: CalendarDate,
  time: TimeOfDay,
  offsetMinutes: number,
): Date {
  const wallClock = utcMillis(date.year, date.month, date.day, time.hour, time.minute);
  return new Date(wallClock - offsetMinutes * 60_000);
}
