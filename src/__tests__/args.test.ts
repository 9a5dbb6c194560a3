// ── Tests: args.ts ────────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { parseCliArgs, parseDateArg } from "../args";
import { DEFAULT_CONFIG } from "../config";

describe("parseDateArg", () => {
  it("parses YYYY-MM-DD", () => {
    expect(parseDateArg("2023-08-14")).toEqual({ year: 2023, month: 8, day: 14 });
  });

  it("rejects impossible dates and other layouts", () => {
    expect(parseDateArg("2023-02-30")).toBeNull();
    expect(parseDateArg("14/08/2023")).toBeNull();
    expect(parseDateArg("2023-8-14")).toBeNull();
  });
});

describe("parseCliArgs", () => {
  it("fills options from the config defaults", () => {
    expect(parseCliArgs(["timetable.txt", "2023-08-14"], DEFAULT_CONFIG)).toEqual({
      ok: true,
      value: {
        file: "timetable.txt",
        semesterStart: { year: 2023, month: 8, day: 14 },
        offsetHours: 8,
        recessWeek: 8,
        out: "./cal.ics",
      },
    });
  });

  it("reads every option", () => {
    const result = parseCliArgs(
      [
        "timetable.txt",
        "2024-01-15",
        "--offset-hours=-5",
        "--recess-week",
        "9",
        "-o",
        "out.ics",
        "--name",
        "Spring",
      ],
      DEFAULT_CONFIG,
    );
    expect(result).toEqual({
      ok: true,
      value: {
        file: "timetable.txt",
        semesterStart: { year: 2024, month: 1, day: 15 },
        offsetHours: -5,
        recessWeek: 9,
        out: "out.ics",
        name: "Spring",
      },
    });
  });

  it("returns help when asked", () => {
    expect(parseCliArgs(["--help"], DEFAULT_CONFIG)).toEqual({ ok: true, value: { help: true } });
  });

  it("requires exactly two positional arguments", () => {
    const result = parseCliArgs(["timetable.txt"], DEFAULT_CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Expected 2 arguments (file, semester-start), got 1");
    }
  });

  it("rejects an invalid start date", () => {
    const result = parseCliArgs(["timetable.txt", "2023-02-30"], DEFAULT_CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("2023-02-30 is not a valid date with format: YYYY-MM-DD");
    }
  });

  it("rejects offsets outside -12..14", () => {
    const result = parseCliArgs(["t.txt", "2023-08-14", "--offset-hours", "15"], DEFAULT_CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid offset: 15 (expected -12..14)");
  });

  it("rejects a non-positive recess week", () => {
    const result = parseCliArgs(["t.txt", "2023-08-14", "--recess-week", "0"], DEFAULT_CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid recess week: 0 (expected a positive integer)");
    }
  });

  it("rejects unknown options as a usage error", () => {
    const result = parseCliArgs(["t.txt", "2023-08-14", "--verbose"], DEFAULT_CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("usage");
  });
});
