// Shared helpers for monitor tests.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { FaultVerdict } from "@wristcheck/contracts";
import type { AlignedFrame } from "@wristcheck/fault-kernel";

import type { AlertSink, DeviceFailure } from "../alerts";

export const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");

export function makeTempDir(prefix = "wristcheck-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function lines(value: number, n: number): string {
  return `${new Array<number>(n).fill(value).join("\n")}\n`;
}

/** Writes one device directory with the given file name -> content map. */
export function writeDevice(dayDir: string, deviceId: string, files: Record<string, string>): string {
  const dir = path.join(dayDir, deviceId);
  fs.mkdirSync(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) fs.writeFileSync(path.join(dir, name), content);
  return dir;
}

/** Three seconds of a healthy device at the default rates. */
export function healthyFiles(): Record<string, string> {
  return {
    "1_on_wrist.csv": lines(1, 3),
    "2_temperature.csv": lines(3000, 12),
    "3_ppg.csv": lines(2000, 192),
  };
}

export class MemoryAlertSink implements AlertSink {
  public readonly faults: Array<{ deviceId: string; verdict: FaultVerdict; samples: number }> = [];
  public readonly failures: Array<{ deviceId: string; failure: DeviceFailure }> = [];

  publishFault(deviceId: string, verdict: FaultVerdict, frame: AlignedFrame): void {
    this.faults.push({ deviceId, verdict, samples: frame.length });
  }

  publishFailure(deviceId: string, failure: DeviceFailure): void {
    this.failures.push({ deviceId, failure });
  }
}
