// ── Tests: convert.ts ─────────────────────────────────────────────────────────
// End-to-end: export text in, .ics text out.

import { describe, it, expect } from "vitest";
import { convertTimetable } from "../convert";
import { SAMPLE_TABLE } from "./sampleTable";

const OPTIONS = {
  semesterStart: { year: 2023, month: 8, day: 14 },
  utcOffsetMinutes: 480,
  recessWeek: 8,
};

describe("convertTimetable", () => {
  it("returns courses, events and the encoded calendar", () => {
    const result = convertTimetable(SAMPLE_TABLE, OPTIONS);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.courses.map((c) => c.code)).toEqual(["CZ2001", "CZ2002"]);
    expect(result.value.events).toHaveLength(8);
    expect(result.value.ics.split("\r\n").filter((l) => l === "BEGIN:VEVENT")).toHaveLength(8);
  });

  it("stops at a table error", () => {
    const result = convertTimetable(SAMPLE_TABLE + "\textra", OPTIONS);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("table-structure");
  });

  it("stops at a field error", () => {
    const result = convertTimetable(SAMPLE_TABLE.replace("0830to1020", "0830-1020"), OPTIONS);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe(
      'Failed to parse period from "0830-1020": expected HHMMtoHHMM (row 0)',
    );
  });
});
