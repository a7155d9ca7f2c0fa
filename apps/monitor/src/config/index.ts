// apps/monitor/src/config/index.ts
//
// Effective config = profile SSOT + optional validated patch, re-checked
// against the contracts schema. Every failure is a ConfigurationError or a
// MonitorConfigPatchRejected; both abort the whole day run.

import type { MonitorConfigV1 } from "@wristcheck/contracts";

import { resolvePatch } from "./patch";
import { computeConfigHash, getMonitorManifest, readProfileJson, resolveRepoRoot, validateMonitorConfig } from "./ssot";
import type { MonitorConfigManifestV1 } from "./ssot";

export type LoadedMonitorConfig = {
  profile: string;
  config: MonitorConfigV1;
  ssot_hash: string;
  effective_config_hash: string;
};

export type LoadMonitorConfigOptions = {
  profile?: string;
  patch?: unknown;
  repoRoot?: string;
};

export function loadProfileConfig(profile: string, repoRoot: string = resolveRepoRoot()): MonitorConfigV1 {
  return validateMonitorConfig(readProfileJson(repoRoot, profile), `profile ${profile}`);
}

export function loadMonitorManifest(profile: string, repoRoot?: string): MonitorConfigManifestV1 {
  return getMonitorManifest(loadProfileConfig(profile, repoRoot), profile);
}

export function loadMonitorConfig(opts: LoadMonitorConfigOptions = {}): LoadedMonitorConfig {
  const profile = opts.profile ?? "default";
  const base = loadProfileConfig(profile, opts.repoRoot);
  const ssot_hash = computeConfigHash(base);

  if (opts.patch === undefined || opts.patch === null) {
    return { profile, config: base, ssot_hash, effective_config_hash: ssot_hash };
  }

  const patched = resolvePatch(base, opts.patch, getMonitorManifest(base, profile));
  const config = validateMonitorConfig(patched, `profile ${profile} + patch`);
  return { profile, config, ssot_hash, effective_config_hash: computeConfigHash(config) };
}

export { computeConfigHash, getMonitorManifest } from "./ssot";
export type { MonitorConfigManifestV1 } from "./ssot";
export { MonitorConfigPatchRejected } from "./patch";
export type { MonitorConfigPatchV1 } from "./patch";
