// apps/monitor/src/config/patch.ts
//
// Monitor config patch.
//
// Contract:
// - replace-only ops
// - path must be in manifest.editable
// - unknown keys are rejected
// - base.ssot_hash mismatch is 409

import type { MonitorConfigV1 } from "@wristcheck/contracts";

import { isObj, stableStringify } from "../util";
import type { MonitorConfigEditableItem, MonitorConfigManifestV1 } from "./ssot";

export type MonitorConfigPatchOpV1 = {
  op: "replace";
  path: string;
  value: number | boolean;
};

export type MonitorConfigPatchV1 = {
  patch_version: "1.0.0";
  base: {
    ssot_hash: string;
  };
  ops: MonitorConfigPatchOpV1[];
};

export type PatchValidationError = {
  code:
    | "INVALID_PATCH_SCHEMA"
    | "UNKNOWN_KEYS"
    | "SSOT_HASH_MISMATCH"
    | "PATH_NOT_ALLOWED"
    | "VALUE_TYPE_MISMATCH"
    | "VALUE_OUT_OF_RANGE";
  path: string;
  message: string;
  meta?: Record<string, unknown>;
};

export class MonitorConfigPatchRejected extends Error {
  public readonly status: number;
  public readonly errors: PatchValidationError[];

  constructor(status: number, errors: PatchValidationError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "MonitorConfigPatchRejected";
    this.status = status;
    this.errors = errors;
  }
}

function unknownKeys(obj: Record<string, unknown>, allow: string[]): string[] {
  const s = new Set(allow);
  return Object.keys(obj).filter((k) => !s.has(k));
}

function checkValue(rule: MonitorConfigEditableItem, v: unknown, at: string): PatchValidationError[] {
  if (rule.type === "bool") {
    return typeof v === "boolean" ? [] : [{ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be boolean" }];
  }

  if (typeof v !== "number" || !Number.isFinite(v) || (rule.type === "int" && !Number.isInteger(v))) {
    return [{ code: "VALUE_TYPE_MISMATCH", path: at, message: `value must be ${rule.type}` }];
  }

  const meta = { min: rule.min, max: rule.max };
  if (typeof rule.min === "number" && v < rule.min) {
    return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value below min", meta }];
  }
  if (typeof rule.max === "number" && v > rule.max) {
    return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value above max", meta }];
  }
  return [];
}

/** Strict schema + allowlist validation. An empty result means `patch` is a MonitorConfigPatchV1. */
export function validatePatchStrict(patch: unknown, manifest: MonitorConfigManifestV1): PatchValidationError[] {
  if (!isObj(patch)) {
    return [{ code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" }];
  }

  const errors: PatchValidationError[] = [];
  const uk = unknownKeys(patch, ["patch_version", "base", "ops"]);
  if (uk.length) {
    errors.push({ code: "UNKNOWN_KEYS", path: "patch", message: `unknown keys: ${uk.join(",")}` });
  }

  if (patch.patch_version !== "1.0.0") {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.patch_version", message: "patch_version must be 1.0.0" });
  }

  const base = patch.base;
  if (!isObj(base)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base", message: "base must be object" });
  } else {
    const ukb = unknownKeys(base, ["ssot_hash"]);
    if (ukb.length) {
      errors.push({ code: "UNKNOWN_KEYS", path: "patch.base", message: `unknown keys: ${ukb.join(",")}` });
    }
    if (typeof base.ssot_hash !== "string") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base.ssot_hash", message: "ssot_hash must be string" });
    }
  }

  const ops = patch.ops;
  if (!Array.isArray(ops)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.ops", message: "ops must be array" });
    return errors;
  }

  const allowed = new Map<string, MonitorConfigEditableItem>();
  for (const it of manifest.editable) allowed.set(it.path, it);

  ops.forEach((op: unknown, i) => {
    const at = `patch.ops[${i}]`;
    if (!isObj(op)) {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: at, message: "op must be object" });
      return;
    }
    const uko = unknownKeys(op, ["op", "path", "value"]);
    if (uko.length) {
      errors.push({ code: "UNKNOWN_KEYS", path: at, message: `unknown keys: ${uko.join(",")}` });
    }
    if (op.op !== "replace") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${at}.op`, message: "op must be replace" });
    }
    if (typeof op.path !== "string" || op.path.trim() === "") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${at}.path`, message: "path must be string" });
      return;
    }
    const rule = allowed.get(op.path.trim());
    if (!rule) {
      errors.push({ code: "PATH_NOT_ALLOWED", path: `${at}.path`, message: `path not allowed: ${op.path.trim()}` });
      return;
    }
    errors.push(...checkValue(rule, op.value, `${at}.value`));
  });

  return errors;
}

export function isMonitorConfigPatchV1(patch: unknown, manifest: MonitorConfigManifestV1): patch is MonitorConfigPatchV1 {
  return validatePatchStrict(patch, manifest).length === 0;
}

function setPath(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const parts = dotPath.split(".");
  let cur = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const next = cur[parts[i]];
    if (isObj(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[parts[i]] = created;
      cur = created;
    }
  }
  cur[parts[parts.length - 1]] = value;
}

/** Pure replace-only application; callers validate first and re-validate the result. */
export function applyPatch(cfg: MonitorConfigV1, patch: MonitorConfigPatchV1): unknown {
  const out: Record<string, unknown> = JSON.parse(stableStringify(cfg));
  for (const op of patch.ops) {
    setPath(out, op.path.trim(), op.value);
  }
  return out;
}

/**
 * Validates `patch` against the manifest and applies it.
 * Throws MonitorConfigPatchRejected (400 schema / 409 stale base).
 */
export function resolvePatch(cfg: MonitorConfigV1, patch: unknown, manifest: MonitorConfigManifestV1): unknown {
  if (!isMonitorConfigPatchV1(patch, manifest)) {
    throw new MonitorConfigPatchRejected(400, validatePatchStrict(patch, manifest));
  }

  if (patch.base.ssot_hash !== manifest.ssot.ssot_hash) {
    throw new MonitorConfigPatchRejected(409, [
      {
        code: "SSOT_HASH_MISMATCH",
        path: "patch.base.ssot_hash",
        message: "patch was built against a different config",
        meta: { expected: manifest.ssot.ssot_hash, got: patch.base.ssot_hash },
      },
    ]);
  }
  return applyPatch(cfg, patch);
}
