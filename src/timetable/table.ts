// ── Timetable table parser ────────────────────────────────────────────────────
// Turns the tab-separated export into Course records. Pure: text in, courses
// (or the first error) out.

import {
  FieldFormatError,
  TableStructureError,
  UnknownCourseError,
} from "../errors";
import type { Class, Course, Exam, Result } from "../types";
import { err, ok } from "../types";
import { parseExam, parsePeriod, parseWeekday, parseWeeks } from "./fields";

/** Width of one logical record in the export. */
export const NUM_COLUMNS = 16;

/** Column roles; 4, 5 and 8 carry nothing the calendar needs. */
export const COLUMN = {
  code: 0,
  title: 1,
  creditUnits: 2,
  courseType: 3,
  index: 6,
  status: 7,
  classType: 9,
  group: 10,
  weekday: 11,
  period: 12,
  venue: 13,
  weeks: 14,
  exam: 15,
} as const;

/** Exam cell value for courses without a final exam. */
export const NO_EXAM = "Not Applicable";

export type ParseTableError =
  | TableStructureError
  | UnknownCourseError
  | FieldFormatError;

// ── Framing ───────────────────────────────────────────────────────────────────

/**
 * Split the export into 16-token records. Line breaks are dropped first, so
 * a cell that wraps onto a second line joins back up with its neighbours.
 */
export function splitRecords(text: string): Result<string[][], TableStructureError> {
  const tokens = text.replace(/[\r\n]/g, "").split("\t");
  const records: string[][] = [];
  for (let i = 0; i < tokens.length; i += NUM_COLUMNS) {
    const record = tokens.slice(i, i + NUM_COLUMNS).map((t) => t.trim());
    if (record.length !== NUM_COLUMNS) {
      return err(new TableStructureError(records.length, NUM_COLUMNS, record.length));
    }
    records.push(record);
  }
  return ok(records);
}

// ── Course builder ────────────────────────────────────────────────────────────

/** Course under construction: header fixed, classes and exam still arriving. */
interface CourseBuilder {
  header: Omit<Course, "classes" | "exam">;
  classes: Class[];
  exam?: Exam;
}

/** Fold state: courses already closed, plus the one rows currently attach to. */
interface Accumulator {
  finished: Course[];
  inProgress: CourseBuilder | null;
}

function build(builder: CourseBuilder): Course {
  return builder.exam === undefined
    ? { ...builder.header, classes: builder.classes }
    : { ...builder.header, classes: builder.classes, exam: builder.exam };
}

/**
 * A record opens a new course only when all six header cells are filled.
 * A partial header is not an error: the row simply continues the current
 * course, which is how the export lays out a course's second and later rows.
 */
function readHeader(row: string[]): CourseBuilder["header"] | null {
  const header = {
    code: row[COLUMN.code],
    title: row[COLUMN.title],
    creditUnits: row[COLUMN.creditUnits],
    courseType: row[COLUMN.courseType],
    index: row[COLUMN.index],
    status: row[COLUMN.status],
  };
  return Object.values(header).every((v) => v !== "") ? header : null;
}

function readClass(
  row: string[],
  recessWeek: number,
): Result<Class, FieldFormatError> {
  const weekday = parseWeekday(row[COLUMN.weekday]);
  if (!weekday.ok) return weekday;
  const period = parsePeriod(row[COLUMN.period]);
  if (!period.ok) return period;
  const weeks = parseWeeks(row[COLUMN.weeks], recessWeek);
  if (!weeks.ok) return weeks;

  return ok({
    weekday: weekday.value,
    period: period.value,
    venue: row[COLUMN.venue],
    group: row[COLUMN.group],
    weeks: [...new Set(weeks.value)].sort((a, b) => a - b),
    classType: row[COLUMN.classType],
  });
}

/** Apply one record to the fold state. Returns a new state; never mutates `acc`. */
function step(
  acc: Accumulator,
  row: string[],
  rowIndex: number,
  recessWeek: number,
): Result<Accumulator, ParseTableError> {
  let { finished, inProgress } = acc;

  const header = readHeader(row);
  if (header) {
    if (inProgress) finished = [...finished, build(inProgress)];
    inProgress = { header, classes: [] };
  }

  const examCell = row[COLUMN.exam];
  if (examCell !== "" && examCell !== NO_EXAM) {
    const exam = parseExam(examCell);
    if (!exam.ok) return err(exam.error.atRow(rowIndex));
    if (!inProgress) {
      return err(new UnknownCourseError(rowIndex, { exam: exam.value }));
    }
    inProgress = { ...inProgress, exam: exam.value };
  }

  // No class type → the row carries no class
  if (row[COLUMN.classType] === "") return ok({ finished, inProgress });

  const cls = readClass(row, recessWeek);
  if (!cls.ok) return err(cls.error.atRow(rowIndex));
  if (!inProgress) {
    return err(new UnknownCourseError(rowIndex, { class: cls.value }));
  }
  inProgress = { ...inProgress, classes: [...inProgress.classes, cls.value] };

  return ok({ finished, inProgress });
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Parse an exported timetable into courses, in table order.
 *
 * @param text        Raw export: tab-separated cells, 16 per record
 * @param recessWeek  Calendar week of the recess; teaching weeks from here on shift by one
 */
export function parseTimetable(
  text: string,
  recessWeek: number,
): Result<Course[], ParseTableError> {
  const records = splitRecords(text);
  if (!records.ok) return records;

  let acc: Accumulator = { finished: [], inProgress: null };
  for (const [i, row] of records.value.entries()) {
    const next = step(acc, row, i, recessWeek);
    if (!next.ok) return next;
    acc = next.value;
  }

  return ok(acc.inProgress ? [...acc.finished, build(acc.inProgress)] : acc.finished);
}
