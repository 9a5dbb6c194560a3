// ── Error taxonomy ────────────────────────────────────────────────────────────
// Each stage stops at its first error and hands back one of these, wrapped in
// a Result. Only the CLI turns them into output.

import type { Class, Exam, Weekday } from "./types";
import { formatCalendarDate } from "./utils/format";

export type ErrorKind =
  | "table-structure"
  | "unknown-course"
  | "field-format"
  | "date-resolution"
  | "calendar-encode"
  | "usage";

export abstract class TimetableError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The token stream does not divide into whole 16-column records. */
export class TableStructureError extends TimetableError {
  readonly kind = "table-structure";

  constructor(
    readonly row: number,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `Missing columns from table on row ${row}: expected ${expected}, found ${actual}`,
    );
  }
}

/** A class or exam row appeared before any course header. */
export class UnknownCourseError extends TimetableError {
  readonly kind = "unknown-course";

  constructor(
    readonly row: number,
    readonly record: { class: Class } | { exam: Exam },
  ) {
    super(`Unknown course for ${describeRecord(record)} on row ${row}`);
  }
}

export type FieldName =
  | "weekday"
  | "period"
  | "weeks"
  | "exam"
  | "exam.day"
  | "exam.month"
  | "exam.year"
  | "exam.date"
  | "exam.time";

/** A single token failed its pattern or does not name a real date/time. */
export class FieldFormatError extends TimetableError {
  readonly kind = "field-format";

  constructor(
    readonly field: FieldName,
    readonly token: string,
    readonly reason: string,
    /** Table row the token came from, when known */
    readonly row?: number,
  ) {
    super(
      `Failed to parse ${field} from "${token}": ${reason}` +
        (row === undefined ? "" : ` (row ${row})`),
    );
  }

  /** Same error, attributed to a table row. */
  atRow(row: number): FieldFormatError {
    return new FieldFormatError(this.field, this.token, this.reason, row);
  }
}

/** An ISO (year, week, weekday) triple that names no calendar date. */
export class DateResolutionError extends TimetableError {
  readonly kind = "date-resolution";

  constructor(
    readonly isoYear: number,
    readonly isoWeek: number,
    readonly weekday: Weekday,
  ) {
    super(
      `Failed to create date from ISO year ${isoYear}, week ${isoWeek}, day ${weekday}`,
    );
  }
}

/** The ics package rejected the generated events. */
export class CalendarEncodeError extends TimetableError {
  readonly kind = "calendar-encode";

  constructor(readonly detail: string) {
    super(`Failed to encode calendar: ${detail}`);
  }
}

/** Bad command-line input. */
export class UsageError extends TimetableError {
  readonly kind = "usage";
}

function describeRecord(record: { class: Class } | { exam: Exam }): string {
  if ("class" in record) {
    const c = record.class;
    return `class ${c.classType} ${c.group} on ${c.weekday} at ${c.venue}, weeks ${c.weeks.join(",")}`;
  }
  return `exam on ${formatCalendarDate(record.exam.date)}`;
}
