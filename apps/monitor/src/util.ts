import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { ConfigurationError } from "@wristcheck/fault-kernel";

export function nowMs(): number {
  return Date.now();
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) {
    return x.map(canonicalize);
  }
  if (isObj(x)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(x).sort()) out[k] = canonicalize(x[k]);
    return out;
  }
  return x;
}

export function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function assertPositiveInt(v: unknown, name: string): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() !== "" ? Number(v) : NaN;
  if (!Number.isInteger(n) || n < 1) throw new ConfigurationError(`invalid ${name}: must be a positive integer`);
  return n;
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Contract:
 * - Returns an absolute directory path.
 * - Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new ConfigurationError(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
