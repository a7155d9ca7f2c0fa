// apps/monitor/src/runtime.ts
//
// One day run: load config (fatal on error), list device directories, fan
// out one isolated task per device, collect an outcome for each.

import type { DayReportV1, DeviceOutcomeV1, FaultVerdict, MonitorConfigV1 } from "@wristcheck/contracts";
import { evaluateDeviceDay, isFaultKernelError } from "@wristcheck/fault-kernel";
import type { AlignedFrame } from "@wristcheck/fault-kernel";

import type { AlertSink, DeviceFailure } from "./alerts";
import { loadMonitorConfig, loadMonitorManifest } from "./config";
import type { MonitorConfigManifestV1 } from "./config";
import type { MonitorLogger } from "./logger";
import { runBounded } from "./pool";
import { dirExists, listDeviceDirs, readDeviceSignals, resolveDayDir } from "./storage/day_reader";
import type { DeviceDir } from "./storage/day_reader";
import { assertPositiveInt } from "./util";

export type MonitorRuntimeDeps = {
  bucketPath: string;
  logger: MonitorLogger;
  alerts: AlertSink;
  repoRoot?: string;
  defaultProfile?: string;
  // Unset means one worker per device.
  defaultWorkers?: number;
};

export type RunDayOptions = {
  workers?: number;
  config_profile?: string;
  config_patch?: unknown;
};

export function describeFailure(e: unknown): DeviceFailure {
  if (isFaultKernelError(e)) return { code: e.code, message: e.message };
  if (e instanceof Error) return { code: "UNEXPECTED_ERROR", message: e.message };
  return { code: "UNEXPECTED_ERROR", message: String(e) };
}

export class MonitorRuntime {
  constructor(private readonly deps: MonitorRuntimeDeps) {}

  private profileOf(options: RunDayOptions): string {
    return options.config_profile ?? this.deps.defaultProfile ?? "default";
  }

  manifest(profile?: string): MonitorConfigManifestV1 {
    return loadMonitorManifest(profile ?? this.deps.defaultProfile ?? "default", this.deps.repoRoot);
  }

  async runDay(day: string, options: RunDayOptions = {}): Promise<DayReportV1> {
    const log = this.deps.logger;
    const loaded = loadMonitorConfig({
      profile: this.profileOf(options),
      patch: options.config_patch,
      repoRoot: this.deps.repoRoot,
    });
    const workersOpt = options.workers ?? this.deps.defaultWorkers;
    const configuredWorkers = workersOpt === undefined ? undefined : assertPositiveInt(workersOpt, "workers");

    const report = {
      type: "day_report_v1" as const,
      day,
      config_profile: loaded.profile,
      effective_config_hash: loaded.effective_config_hash,
    };

    const dayDir = resolveDayDir(this.deps.bucketPath, day);
    if (!(await dirExists(dayDir))) {
      log.info({ day, dir: dayDir }, `No data available for date ${day}`);
      return { ...report, status: "no_data", workers: 0, devices: [] };
    }

    const devices = await listDeviceDirs(dayDir);
    if (devices.length === 0) {
      log.warn({ day, dir: dayDir }, "No devices available");
      return { ...report, status: "no_devices", workers: 0, devices: [] };
    }

    const workers = configuredWorkers ?? devices.length;
    log.info({ day, devices: devices.length, workers, profile: loaded.profile }, "day run started");

    const settled = await runBounded(devices, workers, (d) => this.evaluateDevice(d, loaded.config));

    const outcomes: DeviceOutcomeV1[] = [];
    for (const s of settled) {
      if (s.ok) {
        outcomes.push(s.value);
        continue;
      }
      const failure = describeFailure(s.error);
      log.error({ day, device_id: s.item.device_id, err: s.error }, "device evaluation failed");
      await this.publishFailure(s.item.device_id, failure);
      outcomes.push({ device_id: s.item.device_id, status: "error", error: failure });
    }

    const faulty = outcomes.filter((o) => o.status === "faulty").length;
    const errors = outcomes.filter((o) => o.status === "error").length;
    log.info({ day, devices: outcomes.length, faulty, errors }, "day run finished");

    return { ...report, status: "evaluated", workers, devices: outcomes };
  }

  private async evaluateDevice(device: DeviceDir, cfg: MonitorConfigV1): Promise<DeviceOutcomeV1> {
    const signals = await readDeviceSignals(device.dir);
    const { frame, verdict } = evaluateDeviceDay(signals, cfg);

    if (verdict.is_faulty) {
      await this.publishFault(device.device_id, verdict, frame);
    }
    const status = verdict.is_faulty ? "faulty" : "healthy";
    this.deps.logger.debug({ device_id: device.device_id, status, samples: frame.length }, "device evaluated");
    return { device_id: device.device_id, status, verdict };
  }

  private async publishFault(deviceId: string, verdict: FaultVerdict, frame: AlignedFrame): Promise<void> {
    try {
      await this.deps.alerts.publishFault(deviceId, verdict, frame);
    } catch (err) {
      this.deps.logger.error({ device_id: deviceId, err }, "fault alert could not be published");
    }
  }

  private async publishFailure(deviceId: string, failure: DeviceFailure): Promise<void> {
    try {
      await this.deps.alerts.publishFailure(deviceId, failure);
    } catch (err) {
      // The outcome is still recorded in the report.
      this.deps.logger.error({ device_id: deviceId, err }, "failure notice could not be published");
    }
  }
}
