// ── Date and time formatting utilities ────────────────────────────────────────
// Pure formatting functions, no I/O.

import type { CalendarDate, TimeOfDay } from "../types";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Format a calendar date as "2023-12-01". */
export function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/** Format a time of day as "09:00". */
export function formatTime(time: TimeOfDay): string {
  return `${pad(time.hour)}:${pad(time.minute)}`;
}

/**
 * Format an instant in the basic UTC form used by iCalendar,
 * e.g. 2023-08-14T01:30:00Z → "20230814T013000Z".
 */
export function toUtcStamp(instant: Date): string {
  return (
    pad(instant.getUTCFullYear(), 4) +
    pad(instant.getUTCMonth() + 1) +
    pad(instant.getUTCDate()) +
    "T" +
    pad(instant.getUTCHours()) +
    pad(instant.getUTCMinutes()) +
    pad(instant.getUTCSeconds()) +
    "Z"
  );
}

/** Format a UTC offset in minutes as "UTC+08:00" / "UTC-03:30". */
export function formatUtcOffset(minutes: number): string {
  const sign = minutes < 0 ? "-" : "+";
  const abs = Math.abs(minutes);
  return `UTC${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}
