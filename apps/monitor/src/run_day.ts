/**
 * Evaluates every device of one day and prints an alert per faulty device.
 *
 * Usage:
 *   npm run run:day -- --date 2021-02-03 --workers 4 --profile default --bucket ./raw_bucket
 *
 * Flags fall back to MONITORING_DATE, WORKERS, MONITOR_CONFIG_PROFILE and
 * BUCKET_PATH; the date defaults to yesterday.
 *
 * Exit codes: 0 completed run, 2 configuration error, 1 anything else.
 */

import { ConfigurationError } from "@wristcheck/fault-kernel";

import { ConsoleAlertSink } from "./alerts";
import { parseRunDayArgs } from "./cli_args";
import { MonitorConfigPatchRejected } from "./config";
import { loadEnv, readMonitorEnv, yesterday } from "./env";
import { createLogger } from "./logger";
import { MonitorRuntime } from "./runtime";

async function main(): Promise<number> {
  loadEnv();

  const settings = readMonitorEnv();
  const args = parseRunDayArgs(process.argv.slice(2));
  const logger = createLogger(settings.logLevel);

  const runtime = new MonitorRuntime({
    bucketPath: args.bucket ?? settings.bucketPath,
    logger,
    alerts: new ConsoleAlertSink(),
    defaultProfile: args.profile ?? settings.profile,
    defaultWorkers: args.workers ?? settings.workers,
  });

  const day = args.date ?? settings.monitoringDate ?? yesterday();
  const report = await runtime.runDay(day);
  logger.info({ day, status: report.status, effective_config_hash: report.effective_config_hash }, "done");
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const fatalConfig = err instanceof ConfigurationError || err instanceof MonitorConfigPatchRejected;
    createLogger().fatal({ err }, fatalConfig ? "invalid configuration" : "day run failed");
    process.exitCode = fatalConfig ? 2 : 1;
  }
);
