// Command line flags for run_day.

import { ConfigurationError } from "@wristcheck/fault-kernel";

import { parseMonitoringDay } from "./env";
import { assertPositiveInt } from "./util";

export type RunDayArgs = {
  date?: string;
  workers?: number;
  profile?: string;
  bucket?: string;
};

export function parseRunDayArgs(argv: string[]): RunDayArgs {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) throw new ConfigurationError(`missing value for --${k}`);
    return v;
  };

  const workers = get("workers");
  const date = get("date");
  return {
    date: date === undefined ? undefined : parseMonitoringDay(date, "--date"),
    workers: workers === undefined ? undefined : assertPositiveInt(workers, "--workers"),
    profile: get("profile"),
    bucket: get("bucket"),
  };
}
