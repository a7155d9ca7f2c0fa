// Worn-State Fault Rules
//
// While the device is on the wrist both sensors should read a plausible,
// low-noise signal. Sustained variance or out-of-range temperature beyond a
// window-scaled gate marks the segment.

import type { FaultFinding, WornCheckName } from "@wristcheck/contracts";
import { segmentKey } from "@wristcheck/contracts";
import { countRollingStdAbove } from "../stats/rolling";
import type { AlignedFrame, FaultRulesConfig, Segment } from "../types";

export type WornChecks = Record<WornCheckName, boolean>;

/** Samples outside [min_inclusive, max_exclusive). */
export function countOutsideRange(
  values: ReadonlyArray<number>,
  range: { min_inclusive: number; max_exclusive: number },
  start = 0,
  end = values.length
): number {
  let n = 0;
  for (let i = start; i < end; i++) {
    const v = values[i];
    if (!(v >= range.min_inclusive && v < range.max_exclusive)) n++;
  }
  return n;
}

export function evaluateWornSegment(frame: AlignedFrame, segment: Segment, cfg: FaultRulesConfig): WornChecks {
  const w = cfg.window_size;
  const { start, end } = segment;

  const tempOverStd = countRollingStdAbove(frame.temperature, w, cfg.worn.temperature_std_threshold, start, end);
  const ppgOverStd = countRollingStdAbove(frame.ppg, w, cfg.worn.ppg_std_threshold, start, end);
  const tempOutside = countOutsideRange(frame.temperature, cfg.worn.temperature_value_range, start, end);

  return {
    temperature_over_std_threshold: tempOverStd > w,
    ppg_over_std_threshold: ppgOverStd > 4 * w,
    temperature_outside_range: tempOutside > w,
  };
}

export function evaluateWorn(
  frame: AlignedFrame,
  wornSegments: ReadonlyArray<Segment>,
  cfg: FaultRulesConfig
): FaultFinding {
  const finding: Record<string, WornChecks> = {};
  for (const seg of wornSegments) {
    finding[segmentKey(seg.index)] = evaluateWornSegment(frame, seg, cfg);
  }
  return finding;
}
