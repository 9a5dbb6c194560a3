// ── Command-line arguments ────────────────────────────────────────────────────
// Parsing and validation only; the entry point lives in cli.ts.

import { parseArgs } from "node:util";

import type { Config } from "./config";
import { UsageError } from "./errors";
import type { CalendarDate, Result } from "./types";
import { err, ok } from "./types";
import { makeDate } from "./utils/getDates";

export const USAGE = `Usage: timetable-ics <file> <semester-start YYYY-MM-DD> [options]

  file                 exported timetable (tab-separated text)
  semester-start       any date inside teaching week 1

Options:
  --offset-hours N     hours east of UTC, -12..14 (use --offset-hours=-5 for negatives)
  --recess-week N      calendar week of the recess
  -o, --out PATH       where to write the .ics file
  --name NAME          calendar name shown by calendar apps
  -h, --help           show this message`;

export interface CliArgs {
  file: string;
  semesterStart: CalendarDate;
  offsetHours: number;
  recessWeek: number;
  out: string;
  name?: string;
}

/** Parse "2023-08-14" into a calendar date; null for anything else. */
export function parseDateArg(value: string): CalendarDate | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return null;
  return makeDate(parseInt(m[1], 10), parseInt(m[2], 10), parseInt(m[3], 10));
}

function parseIntArg(value: string | undefined, fallback: number): number | null {
  if (value === undefined) return fallback;
  return /^[+-]?\d+$/.test(value) ? parseInt(value, 10) : null;
}

/**
 * Validate argv (without the node and script entries) against the defaults
 * from config. `help: true` means usage was requested and nothing else applies.
 */
export function parseCliArgs(
  argv: string[],
  config: Config,
): Result<CliArgs | { help: true }, UsageError> {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (e) {
    // node:util throws a TypeError for unknown or malformed options
    return err(new UsageError(e instanceof Error ? e.message : String(e)));
  }
  const { values, positionals } = parsed;

  if (values.help) return ok({ help: true });

  if (positionals.length !== 2) {
    return err(new UsageError(`Expected 2 arguments (file, semester-start), got ${positionals.length}`));
  }
  const [file, startArg] = positionals;

  const semesterStart = parseDateArg(startArg);
  if (!semesterStart) {
    return err(new UsageError(`${startArg} is not a valid date with format: YYYY-MM-DD`));
  }

  const offsetHours = parseIntArg(values["offset-hours"], config.offsetHours);
  if (offsetHours === null || offsetHours < -12 || offsetHours > 14) {
    return err(new UsageError(`Invalid offset: ${values["offset-hours"] ?? config.offsetHours} (expected -12..14)`));
  }

  const recessWeek = parseIntArg(values["recess-week"], config.recessWeek);
  if (recessWeek === null || recessWeek < 1) {
    return err(new UsageError(`Invalid recess week: ${values["recess-week"] ?? config.recessWeek} (expected a positive integer)`));
  }

  const args: CliArgs = {
    file,
    semesterStart,
    offsetHours,
    recessWeek,
    out: values.out ?? config.outFile,
  };
  if (values.name !== undefined) args.name = values.name;
  return ok(args);
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "offset-hours": { type: "string" },
      "recess-week": { type: "string" },
      out: { type: "string", short: "o" },
      name: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}
