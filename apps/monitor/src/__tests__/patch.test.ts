import assert from "node:assert";
import test from "node:test";

import { ConfigurationError } from "@wristcheck/fault-kernel";

import { MonitorConfigPatchRejected, loadMonitorConfig, loadMonitorManifest } from "../config";
import { applyPatch, validatePatchStrict } from "../config/patch";
import type { MonitorConfigPatchV1 } from "../config/patch";
import { REPO_ROOT } from "./helpers";

const manifest = loadMonitorManifest("default", REPO_ROOT);
const ssotHash = manifest.ssot.ssot_hash;

function patchOf(ops: MonitorConfigPatchV1["ops"], hash = ssotHash): MonitorConfigPatchV1 {
  return { patch_version: "1.0.0", base: { ssot_hash: hash }, ops };
}

function rejected(status: number, code: string) {
  return (e: unknown): boolean =>
    e instanceof MonitorConfigPatchRejected && e.status === status && e.errors.some((x) => x.code === code);
}

test("a valid patch changes the effective config and its hash", () => {
  const loaded = loadMonitorConfig({
    repoRoot: REPO_ROOT,
    patch: patchOf([
      { op: "replace", path: "unworn.ppg_std_threshold", value: 200 },
      { op: "replace", path: "unworn.include_trend_checks", value: false },
    ]),
  });

  assert.equal(loaded.config.unworn.ppg_std_threshold, 200);
  assert.equal(loaded.config.unworn.include_trend_checks, false);
  assert.equal(loaded.config.window_size, 16);
  assert.equal(loaded.ssot_hash, ssotHash);
  assert.notEqual(loaded.effective_config_hash, ssotHash);
});

test("applyPatch leaves the base config untouched", () => {
  const base = loadMonitorConfig({ repoRoot: REPO_ROOT }).config;
  const out = applyPatch(base, patchOf([{ op: "replace", path: "window_size", value: 32 }]));
  assert.equal(base.window_size, 16);
  assert.deepEqual(out, { ...base, window_size: 32 });
});

test("a patch built against another config is a 409", () => {
  assert.throws(
    () =>
      loadMonitorConfig({
        repoRoot: REPO_ROOT,
        patch: patchOf([{ op: "replace", path: "window_size", value: 32 }], "sha256:stale"),
      }),
    rejected(409, "SSOT_HASH_MISMATCH")
  );
});

test("paths outside the manifest are rejected", () => {
  assert.throws(
    () =>
      loadMonitorConfig({
        repoRoot: REPO_ROOT,
        patch: patchOf([{ op: "replace", path: "sampling.target_rate_hz", value: 128 }]),
      }),
    rejected(400, "PATH_NOT_ALLOWED")
  );
});

test("value type and range follow the manifest", () => {
  const typeErrors = validatePatchStrict(patchOf([{ op: "replace", path: "window_size", value: 2.5 }]), manifest);
  assert.deepEqual(typeErrors, [
    { code: "VALUE_TYPE_MISMATCH", path: "patch.ops[0].value", message: "value must be int" },
  ]);

  const boolErrors = validatePatchStrict(
    patchOf([{ op: "replace", path: "unworn.include_trend_checks", value: 1 }]),
    manifest
  );
  assert.equal(boolErrors[0].message, "value must be boolean");

  const rangeErrors = validatePatchStrict(patchOf([{ op: "replace", path: "window_size", value: 1 }]), manifest);
  assert.equal(rangeErrors.length, 1);
  assert.equal(rangeErrors[0].code, "VALUE_OUT_OF_RANGE");
  assert.equal(rangeErrors[0].message, "value below min");
});

test("unknown keys and a wrong shape are schema errors", () => {
  const errors = validatePatchStrict(
    { patch_version: "2.0.0", base: { ssot_hash: ssotHash, extra: 1 }, ops: [], note: "x" },
    manifest
  );
  assert.deepEqual(
    errors.map((e) => `${e.code}@${e.path}`),
    ["UNKNOWN_KEYS@patch", "INVALID_PATCH_SCHEMA@patch.patch_version", "UNKNOWN_KEYS@patch.base"]
  );

  assert.deepEqual(validatePatchStrict("nope", manifest), [
    { code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" },
  ]);
  assert.throws(() => loadMonitorConfig({ repoRoot: REPO_ROOT, patch: [] }), rejected(400, "INVALID_PATCH_SCHEMA"));
});

test("a patch that passes the manifest but breaks the schema is a configuration error", () => {
  assert.throws(
    () =>
      loadMonitorConfig({
        repoRoot: REPO_ROOT,
        patch: patchOf([{ op: "replace", path: "worn.temperature_value_range.min_inclusive", value: 4000 }]),
      }),
    (e: unknown) => e instanceof ConfigurationError && e.message.startsWith("invalid monitor config (profile default + patch)")
  );
});
