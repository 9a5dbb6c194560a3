// ── Environment configuration ─────────────────────────────────────────────────
// Defaults for the command line, overridable through the environment or a
// .env file in the working directory.

import "dotenv/config";

export type LogLevel = "info" | "silent";

export interface Config {
  /** Hours east of UTC for the timetable's wall-clock times */
  offsetHours: number;
  recessWeek: number;
  outFile: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Config = {
  offsetHours: 8,
  recessWeek: 8,
  outFile: "./cal.ics",
  logLevel: "info",
};

/**
 * Get integer config from an environment variable.
 * Returns null when unset or not an integer.
 */
export function getIntConfig(
  key: string,
  env: NodeJS.ProcessEnv = process.env,
): number | null {
  const value = env[key];
  if (value == null || value.trim() === "") return null;
  if (!/^[+-]?\d+$/.test(value.trim())) {
    console.error(`Invalid integer config value provided for ${key}: ${value}`);
    return null;
  }
  return parseInt(value, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = env.LOG_LEVEL === "silent" ? "silent" : DEFAULT_CONFIG.logLevel;
  return {
    offsetHours: getIntConfig("TIMETABLE_OFFSET_HOURS", env) ?? DEFAULT_CONFIG.offsetHours,
    recessWeek: getIntConfig("TIMETABLE_RECESS_WEEK", env) ?? DEFAULT_CONFIG.recessWeek,
    outFile: env.TIMETABLE_OUT || DEFAULT_CONFIG.outFile,
    logLevel,
  };
}
