import assert from "node:assert";
import test from "node:test";

import { ConfigurationError } from "../errors";
import { evaluateDeviceDay } from "../kernel";
import { defaultConfig, seededInts } from "./fixtures";

const cfg = defaultConfig();

test("a full worn minute yields no not-worn findings", () => {
  const result = evaluateDeviceDay(
    {
      worn: new Array<number>(60).fill(1),
      temperature: seededInts(11, 2700, 3699, 4 * 61),
      ppg: seededInts(12, 1500, 5500, 64 * 60 + 5),
    },
    cfg
  );

  assert.equal(result.frame.length, Math.min(60 * 64, 61 * 4 * 16, 64 * 60 + 5));
  assert.equal(result.frame.length, 3840);
  assert.equal(result.segments.length, 1);
  assert.deepEqual(result.verdict.explanation.not_worn, {});
  assert.deepEqual(Object.keys(result.verdict.explanation.worn), ["segment_0"]);

  const checks = result.verdict.explanation.worn.segment_0;
  assert.equal(checks.temperature_outside_range, false);
  // PPG values span 4000, so no 16-sample window can reach a std of 3000.
  assert.equal(checks.ppg_over_std_threshold, false);
});

test("warming up after taking the device off flags the day", () => {
  const temperature = [...new Array<number>(8).fill(3000), ...Array.from({ length: 12 }, (_, i) => 3001 + i)];
  const result = evaluateDeviceDay(
    { worn: [1, 1, 0, 0, 0], temperature, ppg: new Array<number>(320).fill(2000) },
    cfg
  );

  assert.equal(result.frame.length, 320);
  assert.deepEqual(result.segments, [
    { index: 0, worn: 1, start: 0, end: 128 },
    { index: 1, worn: 0, start: 128, end: 320 },
  ]);
  assert.deepEqual(result.verdict, {
    is_faulty: true,
    explanation: {
      worn: {
        segment_0: {
          temperature_over_std_threshold: false,
          ppg_over_std_threshold: false,
          temperature_outside_range: false,
        },
      },
      not_worn: {
        segment_1: { ppg_over_threshold: false, is_temperature_increasing: true, is_ppg_increasing: false },
      },
    },
  });
});

test("configuration errors propagate", () => {
  const bad = { ...cfg, sampling: { target_rate_hz: 64, source_rates_hz: { worn: 3, temperature: 4, ppg: 64 } } };
  assert.throws(() => evaluateDeviceDay({ worn: [1], temperature: [3000], ppg: [1] }, bad), ConfigurationError);
});
