// apps/monitor/src/storage/day_reader.ts
//
// Bucket layout: <bucket>/YYYY/MM/DD/device_NNN/{three header-less .csv files}.
// Files are taken in name order as worn flag, temperature, PPG.

import fs from "node:fs/promises";
import path from "node:path";

import { isDeviceDirName } from "@wristcheck/contracts";
import { InsufficientDataError, SIGNAL_NAMES } from "@wristcheck/fault-kernel";
import type { RawSignals } from "@wristcheck/fault-kernel";

export type DeviceDir = { device_id: string; dir: string };

export function resolveDayDir(bucketPath: string, day: string): string {
  const [yyyy, mm, dd] = day.split("-");
  return path.join(bucketPath, yyyy, mm, dd);
}

export async function dirExists(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return false;
    throw e;
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

export async function listDeviceDirs(dayDir: string): Promise<DeviceDir[]> {
  const entries = await fs.readdir(dayDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory() && isDeviceDirName(e.name))
    .map((e) => ({ device_id: e.name, dir: path.join(dayDir, e.name) }))
    .sort((a, b) => a.device_id.localeCompare(b.device_id));
}

/** Parses one single-column signal file. Blank lines are skipped. */
export function parseSignalCsv(text: string, fileName: string): number[] {
  const out: number[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const field = line.split(/[,;]/)[0].trim();
    const v = field === "" ? NaN : Number(field);
    if (!Number.isFinite(v)) {
      throw new InsufficientDataError(`${fileName}:${i + 1}: not a number: ${JSON.stringify(field)}`);
    }
    out.push(v);
  }
  return out;
}

export async function listSignalFiles(deviceDir: string): Promise<string[]> {
  const entries = await fs.readdir(deviceDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".csv"))
    .map((e) => e.name)
    .sort();
}

export async function readDeviceSignals(deviceDir: string): Promise<RawSignals> {
  const files = await listSignalFiles(deviceDir);
  if (files.length !== SIGNAL_NAMES.length) {
    throw new InsufficientDataError(
      `expected ${SIGNAL_NAMES.length} signal files in ${path.basename(deviceDir)}, found ${files.length}`
    );
  }

  const [worn, temperature, ppg] = await Promise.all(
    files.map(async (name) => parseSignalCsv(await fs.readFile(path.join(deviceDir, name), "utf8"), name))
  );
  return { worn, temperature, ppg };
}
