// Signal Aligner
//
// Brings the worn flag, temperature and PPG onto the target grid by sample
// replication, then cuts all three to a common length.

import type { SamplingConfigV1 } from "@wristcheck/contracts";
import { ConfigurationError, InsufficientDataError } from "../errors";
import type { AlignedFrame, RawSignals, SignalName } from "../types";
import { SIGNAL_NAMES } from "../types";

/**
 * Replication factor for one signal. Throws when the target rate is not a
 * whole multiple of the source rate.
 */
export function upsampleFactor(targetRateHz: number, sourceRateHz: number, signal: SignalName): number {
  if (!(targetRateHz > 0) || !(sourceRateHz > 0)) {
    throw new ConfigurationError(`sampling rates must be positive (${signal}: ${sourceRateHz} Hz -> ${targetRateHz} Hz)`);
  }
  const factor = targetRateHz / sourceRateHz;
  if (!Number.isInteger(factor)) {
    throw new ConfigurationError(`target rate ${targetRateHz} Hz is not a whole multiple of ${signal} rate ${sourceRateHz} Hz`);
  }
  return factor;
}

/** Repeats every sample `factor` times, stopping once `limit` samples are produced. */
export function repeatSamples(values: ReadonlyArray<number>, factor: number, limit = values.length * factor): number[] {
  const n = Math.min(limit, values.length * factor);
  const out = new Array<number>(n);
  for (let i = 0; i < n; i++) out[i] = values[Math.floor(i / factor)];
  return out;
}

export function alignSignals(signals: RawSignals, sampling: SamplingConfigV1): AlignedFrame {
  for (const name of SIGNAL_NAMES) {
    if (signals[name].length === 0) throw new InsufficientDataError(`${name} signal is empty`);
  }

  const target = sampling.target_rate_hz;
  const factors = {
    worn: upsampleFactor(target, sampling.source_rates_hz.worn, "worn"),
    temperature: upsampleFactor(target, sampling.source_rates_hz.temperature, "temperature"),
    ppg: upsampleFactor(target, sampling.source_rates_hz.ppg, "ppg"),
  };

  const length = Math.min(
    signals.worn.length * factors.worn,
    signals.temperature.length * factors.temperature,
    signals.ppg.length * factors.ppg
  );

  return {
    rateHz: target,
    length,
    worn: repeatSamples(signals.worn, factors.worn, length),
    temperature: repeatSamples(signals.temperature, factors.temperature, length),
    ppg: repeatSamples(signals.ppg, factors.ppg, length),
  };
}
