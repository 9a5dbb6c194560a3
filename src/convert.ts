// ── Conversion pipeline ───────────────────────────────────────────────────────
// Export text → courses → events → .ics text. Stops at the first error.

import type { GenerateOptions } from "./calendar/events";
import { generateEvents } from "./calendar/events";
import type { TimetableError } from "./errors";
import { encodeCalendar } from "./ics/export";
import { parseTimetable } from "./timetable/table";
import type { CalendarDate, Course, EventRecord, Result } from "./types";
import { ok } from "./types";

export interface ConvertOptions extends GenerateOptions {
  /** Any date inside teaching week 1 */
  semesterStart: CalendarDate;
  /** Minutes east of UTC */
  utcOffsetMinutes: number;
  /** Calendar week of the recess */
  recessWeek: number;
  calName?: string;
}

export interface Conversion {
  courses: Course[];
  events: EventRecord[];
  ics: string;
}

export function convertTimetable(
  text: string,
  options: ConvertOptions,
): Result<Conversion, TimetableError> {
  const courses = parseTimetable(text, options.recessWeek);
  if (!courses.ok) return courses;

  const events = generateEvents(
    courses.value,
    options.semesterStart,
    options.utcOffsetMinutes,
    options,
  );
  if (!events.ok) return events;

  const ics = encodeCalendar(events.value, { calName: options.calName });
  if (!ics.ok) return ics;

  return ok({ courses: courses.value, events: events.value, ics: ics.value });
}
