// Shared test fixtures for @wristcheck/fault-kernel.

import type { MonitorConfigV1 } from "@wristcheck/contracts";
import type { AlignedFrame } from "../types";

export function defaultConfig(): MonitorConfigV1 {
  return {
    schema_version: "1.0.0",
    name: "test",
    sampling: { target_rate_hz: 64, source_rates_hz: { worn: 1, temperature: 4, ppg: 64 } },
    window_size: 16,
    worn: {
      temperature_std_threshold: 200,
      ppg_std_threshold: 3000,
      temperature_value_range: { min_inclusive: 2700, max_exclusive: 3700 },
    },
    unworn: {
      ppg_std_threshold: 500,
      min_segment_length: 64,
      temperature_gradient_spacing: 4,
      ppg_gradient_spacing: 1,
      include_trend_checks: true,
    },
  };
}

export function makeFrame(cols: { worn: number[]; temperature: number[]; ppg: number[] }): AlignedFrame {
  const length = cols.worn.length;
  if (cols.temperature.length !== length || cols.ppg.length !== length) {
    throw new Error("fixture columns must have equal length");
  }
  return { rateHz: 64, length, ...cols };
}

export function repeat(value: number, n: number): number[] {
  return new Array<number>(n).fill(value);
}

/** Values alternating between `a` and `b`, starting with `a`. */
export function alternating(a: number, b: number, n: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < n; i++) out.push(i % 2 === 0 ? a : b);
  return out;
}

/** Deterministic integer generator in [min, max] (inclusive). */
export function seededInts(seed: number, min: number, max: number, n: number): number[] {
  let state = seed >>> 0;
  const out: number[] = [];
  for (let i = 0; i < n; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out.push(min + ((state >>> 16) % (max - min + 1)));
  }
  return out;
}
