// Fault kernel value types.

import type { MonitorConfigV1 } from "@wristcheck/contracts";

export type SignalName = "worn" | "temperature" | "ppg";

export const SIGNAL_NAMES: ReadonlyArray<SignalName> = ["worn", "temperature", "ppg"];

/** One device-day of raw samples, each signal at its own native rate. */
export type RawSignals = Readonly<Record<SignalName, ReadonlyArray<number>>>;

/**
 * Three index-aligned series of equal length on a common grid.
 * Sample i of each series describes the same instant.
 */
export interface AlignedFrame {
  readonly rateHz: number;
  readonly length: number;
  readonly worn: ReadonlyArray<number>;
  readonly temperature: ReadonlyArray<number>;
  readonly ppg: ReadonlyArray<number>;
}

/** Worn-flag value of a segment: 1 on wrist, 0 off wrist. */
export type WornState = number;

/**
 * Maximal run of positions sharing the same worn flag.
 * Covers [start, end) of the frame; `index` is its slot in the segment arena.
 */
export interface Segment {
  readonly index: number;
  readonly worn: WornState;
  readonly start: number;
  readonly end: number;
}

export type FaultRulesConfig = Pick<MonitorConfigV1, "window_size" | "worn" | "unworn">;
