// ── Event expansion ───────────────────────────────────────────────────────────
// Turns parsed courses into one concrete calendar event per class occurrence,
// plus one per exam. No recurrence rules: every week is its own event.

import { randomUUID } from "node:crypto";

import { DateResolutionError } from "../errors";
import type {
  CalendarDate,
  Class,
  Course,
  EventRecord,
  Exam,
  Period,
  Result,
} from "../types";
import { err, ok } from "../types";
import { addDays, isoWeekOf, isoWeekToDate, toUtcInstant } from "../utils/getDates";

export const EXAM_CATEGORY = "Exam";

export interface GenerateOptions {
  /** Clock used for each record's creation instant. Defaults to the system clock. */
  now?: () => Date;
  /** Source of the random part of each uid. Defaults to crypto.randomUUID. */
  uuid?: () => string;
}

interface Context {
  offsetMinutes: number;
  now: () => Date;
  uuid: () => string;
}

function makeContext(offsetMinutes: number, options: GenerateOptions): Context {
  return {
    offsetMinutes,
    now: options.now ?? (() => new Date()),
    uuid: options.uuid ?? randomUUID,
  };
}

function makeEvent(
  ctx: Context,
  course: Course,
  date: CalendarDate,
  period: Period,
  summary: string,
  category: string,
  location?: string,
): EventRecord {
  const event: EventRecord = {
    uid: `${course.code}-${ctx.uuid()}`,
    created: ctx.now(),
    summary,
    start: toUtcInstant(date, period.start, ctx.offsetMinutes),
    end: toUtcInstant(date, period.end, ctx.offsetMinutes),
    category,
  };
  if (location !== undefined) event.location = location;
  return event;
}

/**
 * Events for one class: the first occurrence falls on the class weekday in
 * the ISO week holding the semester start, week w lands (w - 1) weeks later.
 */
export function generateClassEvents(
  course: Course,
  cls: Class,
  semesterStart: CalendarDate,
  offsetMinutes: number,
  options: GenerateOptions = {},
): Result<EventRecord[], DateResolutionError> {
  const ctx = makeContext(offsetMinutes, options);

  const { isoYear, isoWeek } = isoWeekOf(semesterStart);
  const firstDate = isoWeekToDate(isoYear, isoWeek, cls.weekday);
  if (!firstDate) {
    return err(new DateResolutionError(isoYear, isoWeek, cls.weekday));
  }

  const summary = `${course.code} - ${course.title} ${cls.classType}`;
  // Parsed classes arrive sorted; hand-built ones may not
  const weeks = [...cls.weeks].sort((a, b) => a - b);
  return ok(
    weeks.map((w) =>
      makeEvent(
        ctx,
        course,
        addDays(firstDate, 7 * (w - 1)),
        cls.period,
        summary,
        cls.classType,
        cls.venue,
      ),
    ),
  );
}

/** The single event for a course's exam. Exams carry an absolute date, so this cannot fail. */
export function generateExamEvent(
  course: Course,
  exam: Exam,
  offsetMinutes: number,
  options: GenerateOptions = {},
): EventRecord {
  const ctx = makeContext(offsetMinutes, options);
  return makeEvent(
    ctx,
    course,
    exam.date,
    exam.period,
    `${course.code} - ${course.title} Exam`,
    EXAM_CATEGORY,
  );
}

/**
 * Expand every course into calendar events.
 *
 * Order: courses as given; within a course, classes in order and weeks
 * ascending, then the exam (if any).
 *
 * @param semesterStart  Any date inside teaching week 1
 * @param offsetMinutes  UTC offset of the timetable's wall-clock times
 */
export function generateEvents(
  courses: readonly Course[],
  semesterStart: CalendarDate,
  offsetMinutes: number,
  options: GenerateOptions = {},
): Result<EventRecord[], DateResolutionError> {
  const events: EventRecord[] = [];
  for (const course of courses) {
    for (const cls of course.classes) {
      const classEvents = generateClassEvents(
        course,
        cls,
        semesterStart,
        offsetMinutes,
        options,
      );
      if (!classEvents.ok) return classEvents;
      events.push(...classEvents.value);
    }
    if (course.exam) {
      events.push(generateExamEvent(course, course.exam, offsetMinutes, options));
    }
  }
  return ok(events);
}
