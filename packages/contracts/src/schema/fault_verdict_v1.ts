// packages/contracts/src/schema/fault_verdict_v1.ts
import { z } from "zod";

/**
 * Named boolean checks emitted by the rule layers.
 * Worn segments and not-worn segments carry disjoint check sets.
 */
export const WORN_CHECK_NAMES = [
  "temperature_over_std_threshold",
  "ppg_over_std_threshold",
  "temperature_outside_range",
] as const;

export const UNWORN_CHECK_NAMES = ["ppg_over_threshold", "is_temperature_increasing", "is_ppg_increasing"] as const;

export type WornCheckName = (typeof WORN_CHECK_NAMES)[number];
export type UnwornCheckName = (typeof UNWORN_CHECK_NAMES)[number];

export type SegmentChecks = Readonly<Record<string, boolean>>;

/** Segment key -> named boolean checks. */
export type FaultFinding = Readonly<Record<string, SegmentChecks>>;

export type FaultExplanation = {
  worn: FaultFinding;
  not_worn: FaultFinding;
};

export type FaultVerdict = {
  is_faulty: boolean;
  explanation: FaultExplanation;
};

export const SegmentChecksZ = z.record(z.string(), z.boolean());
export const FaultFindingZ = z.record(z.string(), SegmentChecksZ);

export const FaultVerdictZ = z
  .object({
    is_faulty: z.boolean(),
    explanation: z
      .object({
        worn: FaultFindingZ,
        not_worn: FaultFindingZ,
      })
      .strict(),
  })
  .strict();

export function segmentKey(index: number): string {
  return `segment_${index}`;
}
