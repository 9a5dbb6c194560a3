// ── Tests: utils/format.ts ────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { formatCalendarDate, formatTime, formatUtcOffset, toUtcStamp } from "../format";

describe("toUtcStamp", () => {
  it("renders the basic UTC form", () => {
    expect(toUtcStamp(new Date(Date.UTC(2023, 7, 14, 0, 30, 5)))).toBe("20230814T003005Z");
  });

  it("ignores the host time zone", () => {
    expect(toUtcStamp(new Date("2023-12-31T23:59:59+08:00"))).toBe("20231231T155959Z");
  });
});

describe("formatCalendarDate", () => {
  it("zero-pads month and day", () => {
    expect(formatCalendarDate({ year: 2023, month: 8, day: 4 })).toBe("2023-08-04");
  });
});

describe("formatTime", () => {
  it("zero-pads hour and minute", () => {
    expect(formatTime({ hour: 9, minute: 5 })).toBe("09:05");
  });
});

describe("formatUtcOffset", () => {
  it("formats east, west and zero offsets", () => {
    expect(formatUtcOffset(480)).toBe("UTC+08:00");
    expect(formatUtcOffset(-210)).toBe("UTC-03:30");
    expect(formatUtcOffset(0)).toBe("UTC+00:00");
  });
});
