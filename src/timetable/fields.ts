// ── Field parsers ─────────────────────────────────────────────────────────────
// One function per cell grammar of the timetable export. Each is total: it
// returns a typed value or a FieldFormatError naming the token, never throws.

import { FieldFormatError } from "../errors";
import type { CalendarDate, Period, Result, TimeOfDay, Weekday } from "../types";
import { WEEKDAYS, err, ok } from "../types";
import { MONTH_ABBREVIATIONS, makeDate } from "../utils/getDates";

// ── Grammars ──────────────────────────────────────────────────────────────────

/** "0830to1020" */
export const PERIOD_PATTERN = /^(\d{2})(\d{2})to(\d{2})(\d{2})$/;

/** "Teaching Wk1-6,8,10" – everything after the marker is the week list */
export const WEEKS_MARKER_PATTERN = /Teaching Wk(.*)/;

/** One entry of the week list: "5" or "3-7" */
export const WEEK_ENTRY_PATTERN = /^(\d+)(?:-(\d+))?$/;

/** "01-Dec-2023 0900to1100" */
export const EXAM_PATTERN =
  /^(?<day>\d{2})-(?<month>[A-Z][a-z]{2})-(?<year>\d{4}) (?<time>\d{4}to\d{4})$/;

// ── Parsers ───────────────────────────────────────────────────────────────────

/** "Mon" → "Mon". Case-sensitive; "mon" and "Monday" are rejected. */
export function parseWeekday(token: string): Result<Weekday, FieldFormatError> {
  const weekday = WEEKDAYS.find((w) => w === token);
  if (weekday === undefined) {
    return err(
      new FieldFormatError("weekday", token, `expected one of ${WEEKDAYS.join(", ")}`),
    );
  }
  return ok(weekday);
}

function toTimeOfDay(hour: number, minute: number): TimeOfDay | null {
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/** "0900to1030" → 09:00 – 10:30 */
export function parsePeriod(token: string): Result<Period, FieldFormatError> {
  const m = PERIOD_PATTERN.exec(token);
  if (!m) {
    return err(new FieldFormatError("period", token, "expected HHMMtoHHMM"));
  }
  const start = toTimeOfDay(parseInt(m[1], 10), parseInt(m[2], 10));
  const end = toTimeOfDay(parseInt(m[3], 10), parseInt(m[4], 10));
  if (!start || !end) {
    return err(new FieldFormatError("period", token, "not a valid time of day"));
  }
  return ok({ start, end });
}

/** Highest teaching week accepted; an ISO year has at most 53 weeks. */
export const MAX_TEACHING_WEEK = 53;

/**
 * Parse a teaching-week list and shift it onto calendar weeks.
 *
 * Teaching weeks are numbered without the recess week, so every week at or
 * after `recessWeek` moves one later:
 *   parseWeeks("Teaching Wk6,7,8,9,10", 8) → [6, 7, 9, 10, 11]
 *
 * Entries keep their encounter order.
 */
export function parseWeeks(
  token: string,
  recessWeek: number,
): Result<number[], FieldFormatError> {
  const marker = WEEKS_MARKER_PATTERN.exec(token);
  if (!marker) {
    return err(new FieldFormatError("weeks", token, 'missing "Teaching Wk" marker'));
  }

  const weeks: number[] = [];
  for (const entry of marker[1].split(",")) {
    const m = WEEK_ENTRY_PATTERN.exec(entry);
    if (!m) {
      return err(
        new FieldFormatError("weeks", token, `"${entry}" is not a week number or range`),
      );
    }
    const first = parseInt(m[1], 10);
    const last = m[2] === undefined ? first : parseInt(m[2], 10);
    if (first < 1) {
      return err(new FieldFormatError("weeks", token, "week numbers start at 1"));
    }
    if (last < first) {
      return err(new FieldFormatError("weeks", token, `range "${entry}" runs backwards`));
    }
    if (last > MAX_TEACHING_WEEK) {
      return err(
        new FieldFormatError("weeks", token, `week numbers stop at ${MAX_TEACHING_WEEK}`),
      );
    }
    for (let w = first; w <= last; w++) weeks.push(w);
  }

  return ok(weeks.map((w) => (w < recessWeek ? w : w + 1)));
}

/** "01-Dec-2023 0900to1100" → 2023-12-01, 09:00 – 11:00 */
export function parseExam(
  token: string,
): Result<{ date: CalendarDate; period: Period }, FieldFormatError> {
  const groups = EXAM_PATTERN.exec(token)?.groups;
  if (!groups) {
    return err(new FieldFormatError("exam", token, "expected DD-Mon-YYYY HHMMtoHHMM"));
  }

  const day = parseInt(groups.day, 10);
  if (day < 1 || day > 31) {
    return err(new FieldFormatError("exam.day", groups.day, "day out of range"));
  }
  const month = MONTH_ABBREVIATIONS[groups.month];
  if (month === undefined) {
    return err(new FieldFormatError("exam.month", groups.month, "unknown month"));
  }
  const year = parseInt(groups.year, 10);
  if (year < 1) {
    return err(new FieldFormatError("exam.year", groups.year, "year out of range"));
  }
  const date = makeDate(year, month, day);
  if (!date) {
    return err(
      new FieldFormatError("exam.date", token, `no such date ${groups.day}-${groups.month}-${groups.year}`),
    );
  }

  const period = parsePeriod(groups.time);
  if (!period.ok) {
    return err(new FieldFormatError("exam.time", groups.time, period.error.reason));
  }
  return ok({ date, period: period.value });
}
