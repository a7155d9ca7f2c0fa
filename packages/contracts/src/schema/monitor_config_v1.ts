// packages/contracts/src/schema/monitor_config_v1.ts
import { z } from "zod"; // runtime schema validation for the config SSOT

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // schema_version must be SemVer

const RateHzZ = z.number().int().positive(); // sampling rates are whole Hz
const ThresholdZ = z.number().finite().nonnegative();

export const SamplingConfigV1Z = z
  .object({
    target_rate_hz: RateHzZ,
    source_rates_hz: z
      .object({
        worn: RateHzZ,
        temperature: RateHzZ,
        ppg: RateHzZ,
      })
      .strict(),
  })
  .strict();

export const TemperatureRangeV1Z = z
  .object({
    min_inclusive: z.number().finite(),
    max_exclusive: z.number().finite(),
  })
  .strict()
  .refine((r) => r.min_inclusive < r.max_exclusive, {
    message: "temperature_value_range.min_inclusive must be < max_exclusive",
  });

export const WornRulesConfigV1Z = z
  .object({
    temperature_std_threshold: ThresholdZ,
    ppg_std_threshold: ThresholdZ,
    temperature_value_range: TemperatureRangeV1Z,
  })
  .strict();

export const UnwornRulesConfigV1Z = z
  .object({
    ppg_std_threshold: ThresholdZ,
    min_segment_length: z.number().int().positive(),
    temperature_gradient_spacing: z.number().finite().positive(),
    ppg_gradient_spacing: z.number().finite().positive(),
    include_trend_checks: z.boolean(),
  })
  .strict();

export const MonitorConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    name: z.string().min(1).optional(),
    sampling: SamplingConfigV1Z,
    window_size: z.number().int().min(2), // a one-sample window has no sample std
    worn: WornRulesConfigV1Z,
    unworn: UnwornRulesConfigV1Z,
  })
  .strict()
  .superRefine((cfg, ctx) => {
    // Up-sampling replicates samples, so every source rate must divide the target rate.
    const target = cfg.sampling.target_rate_hz;
    for (const [signal, rate] of Object.entries(cfg.sampling.source_rates_hz)) {
      if (target % rate !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sampling", "source_rates_hz", signal],
          message: `target_rate_hz ${target} is not a whole multiple of ${signal} rate ${rate}`,
        });
      }
    }
  });

export type SamplingConfigV1 = z.infer<typeof SamplingConfigV1Z>;
export type WornRulesConfigV1 = z.infer<typeof WornRulesConfigV1Z>;
export type UnwornRulesConfigV1 = z.infer<typeof UnwornRulesConfigV1Z>;
export type MonitorConfigV1 = z.infer<typeof MonitorConfigV1Z>;

/** Returns the parsed config or the flattened list of schema issues. */
export function safeParseMonitorConfigV1(
  input: unknown
): { ok: true; config: MonitorConfigV1 } | { ok: false; issues: string[] } {
  const res = MonitorConfigV1Z.safeParse(input);
  if (res.success) return { ok: true, config: res.data };
  return {
    ok: false,
    issues: res.error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`),
  };
}
