// ── Tests: errors.ts ──────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  CalendarEncodeError,
  DateResolutionError,
  FieldFormatError,
  TimetableError,
} from "../errors";

describe("DateResolutionError", () => {
  it("names the triple that has no date", () => {
    const error = new DateResolutionError(2023, 53, "Mon");
    expect(error).toBeInstanceOf(TimetableError);
    expect(error.name).toBe("DateResolutionError");
    expect(error.kind).toBe("date-resolution");
    expect(error.message).toBe("Failed to create date from ISO year 2023, week 53, day Mon");
  });
});

describe("FieldFormatError", () => {
  it("adds the row without changing the rest", () => {
    const error = new FieldFormatError("period", "2500to1030", "not a valid time of day");
    const located = error.atRow(4);
    expect(error.row).toBeUndefined();
    expect(located.row).toBe(4);
    expect(located.field).toBe("period");
    expect(located.message).toBe(
      'Failed to parse period from "2500to1030": not a valid time of day (row 4)',
    );
  });
});

describe("CalendarEncodeError", () => {
  it("wraps the encoder's message", () => {
    expect(new CalendarEncodeError("start is required").message).toBe(
      "Failed to encode calendar: start is required",
    );
  });
});
