// apps/monitor/src/config/ssot.ts
//
// Monitor config SSOT / manifest helpers.
//
// Contract:
// - SSOT files: config/monitor/<profile>.json
// - ssot_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - the manifest lists the only paths a patch may replace

import fs from "node:fs";
import path from "node:path";

import type { MonitorConfigV1 } from "@wristcheck/contracts";
import { safeParseMonitorConfigV1 } from "@wristcheck/contracts";
import { ConfigurationError } from "@wristcheck/fault-kernel";

import { findRepoRoot, nowMs, sha256Hex, stableStringify } from "../util";

export type ManifestValueType = "int" | "number" | "bool";

export type MonitorConfigEditableItem = {
  // Full dot path (e.g. "unworn.ppg_std_threshold")
  path: string;
  type: ManifestValueType;
  // Numeric constraints (only for int/number)
  min?: number;
  max?: number;
  description?: string;
};

export type MonitorConfigManifestV1 = {
  ssot: {
    source: string;
    profile: string;
    schema_version: string;
    ssot_hash: string;
    updated_at_ts: number;
  };
  patch: {
    patch_version: "1.0.0";
    op_allowed: ["replace"];
    unknown_keys_policy: "reject";
  };
  editable: MonitorConfigEditableItem[];
  defaults: Record<string, unknown>;
  read_only_hints: string[];
};

const PROFILE_RE = /^[a-z0-9][a-z0-9_-]*$/;

export function resolveRepoRoot(): string {
  if (process.env.WRISTCHECK_REPO_ROOT) return path.resolve(process.env.WRISTCHECK_REPO_ROOT);
  return findRepoRoot(process.cwd(), path.join("config", "monitor", "default.json"));
}

export function profilePath(repoRoot: string, profile: string): string {
  if (!PROFILE_RE.test(profile)) throw new ConfigurationError(`invalid config profile name: ${profile}`);
  return path.join(repoRoot, "config", "monitor", `${profile}.json`);
}

/** Reads a profile file without validating it. */
export function readProfileJson(repoRoot: string, profile: string): unknown {
  const p = profilePath(repoRoot, profile);
  if (!fs.existsSync(p)) throw new ConfigurationError(`config profile not found: ${profile}`);
  const raw = fs.readFileSync(p, "utf8");
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`config profile ${profile} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function validateMonitorConfig(cfg: unknown, label: string): MonitorConfigV1 {
  const res = safeParseMonitorConfigV1(cfg);
  if (!res.ok) throw new ConfigurationError(`invalid monitor config (${label})`, res.issues);
  return res.config;
}

export function computeConfigHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

function getPath(obj: unknown, dotPath: string): unknown {
  let cur: unknown = obj;
  for (const p of dotPath.split(".")) {
    if (!cur || typeof cur !== "object" || !(p in cur)) return undefined;
    cur = Reflect.get(cur, p);
  }
  return cur;
}

export function getMonitorManifest(cfg: MonitorConfigV1, profile: string): MonitorConfigManifestV1 {
  const editable: MonitorConfigEditableItem[] = [
    { path: "window_size", type: "int", min: 2, max: 4096, description: "Rolling window length in aligned samples" },

    { path: "worn.temperature_std_threshold", type: "number", min: 0, max: 1e6, description: "Worn temperature rolling std threshold" },
    { path: "worn.ppg_std_threshold", type: "number", min: 0, max: 1e9, description: "Worn PPG rolling std threshold" },
    { path: "worn.temperature_value_range.min_inclusive", type: "number", min: -1e6, max: 1e6, description: "Lowest in-range temperature" },
    { path: "worn.temperature_value_range.max_exclusive", type: "number", min: -1e6, max: 1e6, description: "First out-of-range temperature above" },

    { path: "unworn.ppg_std_threshold", type: "number", min: 0, max: 1e9, description: "Off-wrist PPG rolling std threshold" },
    { path: "unworn.min_segment_length", type: "int", min: 1, max: 10_000_000, description: "Shortest off-wrist segment evaluated" },
    { path: "unworn.include_trend_checks", type: "bool", description: "Emit off-wrist trend checks into the verdict" },
  ];

  const defaults: Record<string, unknown> = {};
  for (const it of editable) defaults[it.path] = getPath(cfg, it.path);

  return {
    ssot: {
      source: `config/monitor/${profile}.json`,
      profile,
      schema_version: cfg.schema_version,
      ssot_hash: computeConfigHash(cfg),
      updated_at_ts: nowMs(),
    },
    patch: {
      patch_version: "1.0.0",
      op_allowed: ["replace"],
      unknown_keys_policy: "reject",
    },
    editable,
    defaults,
    read_only_hints: ["schema_version", "name", "sampling", "unworn.temperature_gradient_spacing", "unworn.ppg_gradient_spacing"],
  };
}
