// Fault kernel entrypoint.
//
// Pure evaluation of one device-day:
// align -> segment -> worn / not-worn rules -> verdict.
// No IO. No shared state.

import type { FaultVerdict, MonitorConfigV1 } from "@wristcheck/contracts";
import { alignSignals } from "./align/aligner";
import { segmentFrame, segmentsByState } from "./segment/segmenter";
import { evaluateWorn } from "./rules/worn_rules";
import { evaluateUnworn } from "./rules/unworn_rules";
import { aggregateVerdict } from "./verdict/aggregator";
import type { AlignedFrame, RawSignals, Segment } from "./types";

export const WORN = 1;
export const NOT_WORN = 0;

export type DeviceDayEvaluation = {
  frame: AlignedFrame;
  segments: ReadonlyArray<Segment>;
  verdict: FaultVerdict;
};

/**
 * Evaluates one device-day of raw signals against the given config.
 *
 * @throws ConfigurationError when a source rate does not divide the target rate.
 * @throws InsufficientDataError when a signal is empty.
 */
export function evaluateDeviceDay(signals: RawSignals, cfg: MonitorConfigV1): DeviceDayEvaluation {
  const frame = alignSignals(signals, cfg.sampling);
  const segments = segmentFrame(frame);

  // The two rule layers read disjoint segments and are order-independent.
  const wornFinding = evaluateWorn(frame, segmentsByState(segments, WORN), cfg);
  const unwornFinding = evaluateUnworn(frame, segmentsByState(segments, NOT_WORN), cfg);

  return { frame, segments, verdict: aggregateVerdict(wornFinding, unwornFinding) };
}
