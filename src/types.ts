// ── Shared types for the timetable → calendar converter ───────────────────────

// ── Calendar values ───────────────────────────────────────────────────────────

/** A date with no time or zone attached. month is 1-based. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** Wall-clock time of day, 00:00 – 23:59. */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** Three-letter weekday tokens as printed in the timetable export. */
export const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Start/end slot of a class or exam. start < end is not checked. */
export interface Period {
  start: TimeOfDay;
  end: TimeOfDay;
}

// ── Timetable records ─────────────────────────────────────────────────────────

/** One weekly-recurring class slot, built from a single table row. */
export interface Class {
  readonly weekday: Weekday;
  readonly period: Period;
  readonly venue: string;
  /** Tutorial/lab group label, e.g. "T12" */
  readonly group: string;
  /** Calendar week numbers, ascending and unique, recess week already skipped */
  readonly weeks: readonly number[];
  /** e.g. "LEC/STUDIO", "TUT", "LAB" */
  readonly classType: string;
}

export interface Exam {
  readonly date: CalendarDate;
  readonly period: Period;
}

/**
 * A registered course. The six header strings are opaque labels copied
 * from the export and are never empty.
 */
export interface Course {
  readonly code: string;
  readonly title: string;
  /** Credit units label, e.g. "3.0" */
  readonly creditUnits: string;
  /** e.g. "CORE", "UE" */
  readonly courseType: string;
  /** Index number of the registered class group */
  readonly index: string;
  /** Registration status, e.g. "REGISTERED" */
  readonly status: string;
  readonly classes: readonly Class[];
  readonly exam?: Exam;
}

// ── Calendar output ───────────────────────────────────────────────────────────

/** One concrete calendar event: a single class occurrence or an exam. */
export interface EventRecord {
  /** "<course code>-<uuid>" */
  uid: string;
  /** When the record was generated (UTC instant) */
  created: Date;
  summary: string;
  start: Date;
  end: Date;
  /** Class type for class events, "Exam" for exams */
  category: string;
  /** Venue; absent for exams */
  location?: string;
}

// ── Results ───────────────────────────────────────────────────────────────────

/** Tagged success/failure value returned by every parsing and expansion step. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
