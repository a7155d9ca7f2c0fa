// Process environment for the monitor app.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { IsoDayZ } from "@wristcheck/contracts";
import { ConfigurationError } from "@wristcheck/fault-kernel";
import { assertPositiveInt } from "./util";

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (env[key] == null) env[key] = val;
  }
}

export function loadEnv(): void {
  // Repo root .env first, then the app-local one; earlier values win.
  const here = path.dirname(fileURLToPath(import.meta.url));
  loadDotEnvFile(path.join(here, "..", "..", "..", ".env"));
  loadDotEnvFile(path.join(here, "..", ".env"));
}

export type MonitorEnv = {
  bucketPath: string;
  workers?: number;
  monitoringDate?: string;
  profile: string;
  logLevel: string;
  port: number;
  host: string;
};

/** Reads and validates monitor settings. Throws ConfigurationError on bad values. */
export function readMonitorEnv(env: NodeJS.ProcessEnv = process.env): MonitorEnv {
  const workersRaw = env.WORKERS?.trim();
  const dateRaw = env.MONITORING_DATE?.trim();

  return {
    bucketPath: env.BUCKET_PATH?.trim() || "raw_bucket",
    workers: workersRaw ? assertPositiveInt(workersRaw, "WORKERS") : undefined,
    monitoringDate: dateRaw ? parseMonitoringDay(dateRaw, "MONITORING_DATE") : undefined,
    profile: env.MONITOR_CONFIG_PROFILE?.trim() || "default",
    logLevel: env.LOG_LEVEL?.trim() || "info",
    port: env.PORT ? assertPositiveInt(env.PORT, "PORT") : 3110,
    host: env.HOST?.trim() || "0.0.0.0",
  };
}

export function parseMonitoringDay(raw: string, name = "date"): string {
  const res = IsoDayZ.safeParse(raw);
  if (!res.success) throw new ConfigurationError(`invalid ${name}: ${raw} (expected YYYY-MM-DD)`);
  return res.data;
}

/** The calendar day before `now`, in local time. */
export function yesterday(now: Date = new Date()): string {
  const d = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}
