// Unworn-State Fault Rules
//
// Off the wrist both signals should settle toward ambient. A net rising trend
// or sustained PPG variance points at spurious readings rather than rest.

import type { FaultFinding, SegmentChecks, UnwornCheckName } from "@wristcheck/contracts";
import { segmentKey } from "@wristcheck/contracts";
import { countRollingStdAbove, gradient, sum } from "../stats/rolling";
import { segmentLength } from "../segment/segmenter";
import type { AlignedFrame, FaultRulesConfig, Segment } from "../types";

export function isUnwornSegmentEligible(segment: Segment, cfg: FaultRulesConfig): boolean {
  return segmentLength(segment) >= cfg.unworn.min_segment_length;
}

export function evaluateUnwornSegment(frame: AlignedFrame, segment: Segment, cfg: FaultRulesConfig): SegmentChecks {
  const w = cfg.window_size;
  const { start, end } = segment;

  const ppgOverStd = countRollingStdAbove(frame.ppg, w, cfg.unworn.ppg_std_threshold, start, end);
  const checks: Array<[UnwornCheckName, boolean]> = [["ppg_over_threshold", ppgOverStd > 4 * w]];

  if (cfg.unworn.include_trend_checks) {
    // gradient() needs two samples; shorter segments have no trend.
    const n = end - start;
    const tempTrend = n < 2 ? 0 : sum(gradient(frame.temperature, cfg.unworn.temperature_gradient_spacing, start, end));
    const ppgTrend = n < 2 ? 0 : sum(gradient(frame.ppg, cfg.unworn.ppg_gradient_spacing, start, end));
    checks.push(["is_temperature_increasing", tempTrend > 0], ["is_ppg_increasing", ppgTrend > 0]);
  }

  return Object.fromEntries(checks);
}

export function evaluateUnworn(
  frame: AlignedFrame,
  unwornSegments: ReadonlyArray<Segment>,
  cfg: FaultRulesConfig
): FaultFinding {
  const finding: Record<string, SegmentChecks> = {};
  for (const seg of unwornSegments) {
    if (!isUnwornSegmentEligible(seg, cfg)) continue;
    finding[segmentKey(seg.index)] = evaluateUnwornSegment(frame, seg, cfg);
  }
  return finding;
}
