// Verdict Aggregator
//
// One positive check on one segment is enough to flag the device-day.

import type { FaultFinding, FaultVerdict } from "@wristcheck/contracts";
import { MalformedFindingError } from "../errors";

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/**
 * Walks a finding and reports whether any leaf check is true.
 * Throws MalformedFindingError when an entry is not a mapping of booleans.
 */
export function findingContainsTrue(finding: FaultFinding, label: string): boolean {
  if (!isPlainObject(finding)) throw new MalformedFindingError(label, "finding must be a mapping");

  let any = false;
  for (const [key, checks] of Object.entries(finding)) {
    const path = `${label}.${key}`;
    if (!isPlainObject(checks)) throw new MalformedFindingError(path, "segment checks must be a mapping of booleans");
    for (const [name, value] of Object.entries(checks)) {
      if (typeof value !== "boolean") {
        throw new MalformedFindingError(`${path}.${name}`, `check value must be boolean, got ${typeof value}`);
      }
      if (value) any = true;
    }
  }
  return any;
}

export function aggregateVerdict(wornFinding: FaultFinding, unwornFinding: FaultFinding): FaultVerdict {
  // Both findings are fully validated before deciding.
  const wornFaulty = findingContainsTrue(wornFinding, "worn");
  const unwornFaulty = findingContainsTrue(unwornFinding, "not_worn");

  return {
    is_faulty: wornFaulty || unwornFaulty,
    explanation: { worn: wornFinding, not_worn: unwornFinding },
  };
}
