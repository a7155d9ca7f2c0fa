import assert from "node:assert";
import test from "node:test";

import { runBounded } from "../pool";

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

test("never runs more than the limit at once", async () => {
  let inFlight = 0;
  let peak = 0;
  const items = [5, 1, 4, 2, 3, 1, 2];

  const settled = await runBounded(items, 3, async (ms) => {
    inFlight++;
    peak = Math.max(peak, inFlight);
    await tick(ms);
    inFlight--;
    return ms * 10;
  });

  assert.equal(peak, 3);
  assert.deepEqual(
    settled.map((s) => (s.ok ? s.value : null)),
    [50, 10, 40, 20, 30, 10, 20]
  );
});

test("a failing task does not stop the others", async () => {
  const settled = await runBounded(["a", "boom", "c"], 2, async (item) => {
    if (item === "boom") throw new Error("exploded");
    return item.toUpperCase();
  });

  assert.equal(settled.length, 3);
  assert.deepEqual(settled[0], { item: "a", ok: true, value: "A" });
  assert.deepEqual(settled[2], { item: "c", ok: true, value: "C" });
  const failed = settled[1];
  assert.equal(failed.ok, false);
  if (!failed.ok) {
    assert.ok(failed.error instanceof Error);
    assert.equal(failed.error.message, "exploded");
  }
});

test("an empty list settles immediately", async () => {
  assert.deepEqual(await runBounded([], 4, async () => 1), []);
});

test("the limit must be a positive integer", async () => {
  await assert.rejects(runBounded([1], 0, async (x) => x), RangeError);
  await assert.rejects(runBounded([1], 1.5, async (x) => x), RangeError);
});
