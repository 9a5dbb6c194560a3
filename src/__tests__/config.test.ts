// ── Tests: config.ts ──────────────────────────────────────────────────────────

import { afterEach, describe, it, expect, vi } from "vitest";
import { DEFAULT_CONFIG, getIntConfig, loadConfig } from "../config";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("getIntConfig", () => {
  it("returns null when unset or blank", () => {
    expect(getIntConfig("TIMETABLE_RECESS_WEEK", {})).toBeNull();
    expect(getIntConfig("TIMETABLE_RECESS_WEEK", { TIMETABLE_RECESS_WEEK: " " })).toBeNull();
  });

  it("parses signed integers", () => {
    expect(getIntConfig("TIMETABLE_OFFSET_HOURS", { TIMETABLE_OFFSET_HOURS: "-3" })).toBe(-3);
  });

  it("reports and ignores a non-integer value", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(getIntConfig("TIMETABLE_OFFSET_HOURS", { TIMETABLE_OFFSET_HOURS: "8.5" })).toBeNull();
    expect(error).toHaveBeenCalledWith(
      "Invalid integer config value provided for TIMETABLE_OFFSET_HOURS: 8.5",
    );
  });
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        TIMETABLE_OFFSET_HOURS: "-3",
        TIMETABLE_RECESS_WEEK: "9",
        TIMETABLE_OUT: "semester.ics",
        LOG_LEVEL: "silent",
      }),
    ).toEqual({ offsetHours: -3, recessWeek: 9, outFile: "semester.ics", logLevel: "silent" });
  });
});
