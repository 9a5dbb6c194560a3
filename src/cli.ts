// ── timetable-ics command line ────────────────────────────────────────────────
// Reads an exported timetable, writes the matching .ics file.
//
//   npm run convert -- timetable.txt 2023-08-14 --offset-hours 8 -o cal.ics

import { readFile, writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";

import { USAGE, parseCliArgs } from "./args";
import type { Config } from "./config";
import { loadConfig } from "./config";
import { convertTimetable } from "./convert";
import { formatCalendarDate, formatUtcOffset } from "./utils/format";

/** File and console access, swappable in tests. */
export interface CliIO {
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, data: string) => Promise<void>;
  log: (message: string) => void;
  error: (message: string) => void;
}

export const nodeIO: CliIO = {
  readFile: (path) => readFile(path, "utf8"),
  writeFile: (path, data) => writeFile(path, data, "utf8"),
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

/** Run the converter; resolves to the process exit code. */
export async function run(
  argv: string[],
  config: Config,
  io: CliIO = nodeIO,
): Promise<number> {
  const info: (message: string) => void =
    config.logLevel === "silent" ? () => {} : io.log;

  const args = parseCliArgs(argv, config);
  if (!args.ok) {
    io.error(args.error.message);
    io.error(USAGE);
    return 1;
  }
  if ("help" in args.value) {
    io.log(USAGE);
    return 0;
  }
  const { file, semesterStart, offsetHours, recessWeek, out, name } = args.value;

  let table: string;
  try {
    table = await io.readFile(file);
  } catch (e) {
    io.error(`Failed to read timetable file ${file}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const utcOffsetMinutes = offsetHours * 60;
  info(
    `Converting ${file}: semester starts ${formatCalendarDate(semesterStart)}, ` +
      `${formatUtcOffset(utcOffsetMinutes)}, recess week ${recessWeek}`,
  );

  const result = convertTimetable(table, {
    semesterStart,
    utcOffsetMinutes,
    recessWeek,
    calName: name,
  });
  if (!result.ok) {
    io.error(result.error.message);
    return 1;
  }

  const { courses, events, ics } = result.value;
  try {
    await io.writeFile(out, ics);
  } catch (e) {
    io.error(`Failed to save calendar to ${out}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
  info(`Wrote ${events.length} events for ${courses.length} courses to ${out}`);
  return 0;
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = await run(process.argv.slice(2), loadConfig());
}
