import assert from "node:assert";
import test from "node:test";

import { alignSignals, repeatSamples, upsampleFactor } from "../align/aligner";
import { ConfigurationError, InsufficientDataError } from "../errors";
import { defaultConfig, seededInts } from "./fixtures";

const sampling = defaultConfig().sampling;

test("up-samples by replication and truncates to the shortest signal", () => {
  const frame = alignSignals(
    {
      worn: [1, 0],
      temperature: [3000, 3001, 3002, 3003, 3004, 3005, 3006],
      ppg: seededInts(7, 1500, 5500, 100),
    },
    sampling
  );

  assert.equal(frame.length, 100);
  assert.equal(frame.rateHz, 64);
  assert.equal(frame.worn.length, 100);
  assert.equal(frame.temperature.length, 100);
  assert.equal(frame.ppg.length, 100);
  assert.equal(frame.worn[63], 1);
  assert.equal(frame.worn[64], 0);
  assert.equal(frame.temperature[15], 3000);
  assert.equal(frame.temperature[16], 3001);
  assert.equal(frame.temperature[47], 3002);
});

test("frame length is the minimum of floor(len * target / rate)", () => {
  const triples = [
    { target_rate_hz: 64, source_rates_hz: { worn: 1, temperature: 4, ppg: 64 } },
    { target_rate_hz: 32, source_rates_hz: { worn: 2, temperature: 8, ppg: 32 } },
    { target_rate_hz: 12, source_rates_hz: { worn: 3, temperature: 4, ppg: 6 } },
  ];
  const counts = [1, 2, 5, 17, 64, 130];

  for (const s of triples) {
    for (const nw of counts) {
      for (const nt of counts) {
        for (const np of counts) {
          const frame = alignSignals(
            { worn: new Array<number>(nw).fill(1), temperature: new Array<number>(nt).fill(3000), ppg: new Array<number>(np).fill(2000) },
            s
          );
          const expected = Math.min(
            Math.floor((nw * s.target_rate_hz) / s.source_rates_hz.worn),
            Math.floor((nt * s.target_rate_hz) / s.source_rates_hz.temperature),
            Math.floor((np * s.target_rate_hz) / s.source_rates_hz.ppg)
          );
          assert.equal(frame.length, expected);
          assert.equal(frame.worn.length, expected);
          assert.equal(frame.temperature.length, expected);
          assert.equal(frame.ppg.length, expected);
        }
      }
    }
  }
});

test("rejects a rate that is not a whole divisor of the target rate", () => {
  assert.throws(
    () =>
      alignSignals(
        { worn: [1], temperature: [3000], ppg: [2000] },
        { target_rate_hz: 64, source_rates_hz: { worn: 1, temperature: 5, ppg: 64 } }
      ),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message === "target rate 64 Hz is not a whole multiple of temperature rate 5 Hz"
  );
  assert.throws(() => upsampleFactor(32, 64, "ppg"), ConfigurationError);
});

test("rejects empty signals", () => {
  assert.throws(
    () => alignSignals({ worn: [1], temperature: [], ppg: [2000] }, sampling),
    (err: unknown) => err instanceof InsufficientDataError && err.message === "temperature signal is empty"
  );
});

test("repeatSamples honours the limit", () => {
  assert.deepEqual(repeatSamples([1, 2, 3], 2), [1, 1, 2, 2, 3, 3]);
  assert.deepEqual(repeatSamples([1, 2, 3], 2, 3), [1, 1, 2]);
  assert.equal(upsampleFactor(64, 4, "temperature"), 16);
});
