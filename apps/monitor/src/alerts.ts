// Alert sinks.
//
// A real deployment would publish to the monitoring stack; the console sink
// prints one block per faulty device.

import type { FaultVerdict } from "@wristcheck/contracts";
import type { AlignedFrame } from "@wristcheck/fault-kernel";

export type DeviceFailure = { code: string; message: string };

export interface AlertSink {
  publishFault(deviceId: string, verdict: FaultVerdict, frame: AlignedFrame): void | Promise<void>;
  publishFailure(deviceId: string, failure: DeviceFailure): void | Promise<void>;
}

export function formatFaultAlert(deviceId: string, verdict: FaultVerdict, frame: AlignedFrame): string {
  return [
    `Device ${deviceId} is malfunctioning!`,
    `Samples: ${frame.length} @ ${frame.rateHz} Hz`,
    "Explanation:",
    JSON.stringify(verdict.explanation, null, 4),
    "-------------",
    "",
  ].join("\n");
}

export function formatFailureNotice(deviceId: string, failure: DeviceFailure): string {
  return `Device ${deviceId} could not be evaluated (${failure.code}): ${failure.message}\n`;
}

export class ConsoleAlertSink implements AlertSink {
  constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  publishFault(deviceId: string, verdict: FaultVerdict, frame: AlignedFrame): void {
    this.write(formatFaultAlert(deviceId, verdict, frame));
  }

  publishFailure(deviceId: string, failure: DeviceFailure): void {
    this.write(formatFailureNotice(deviceId, failure));
  }
}
