// Fault kernel error taxonomy.
//
// Each class carries a stable `code` so callers can report failures
// without matching on message text.

export type FaultKernelErrorCode = "CONFIGURATION_ERROR" | "INSUFFICIENT_DATA" | "MALFORMED_FINDING";

export abstract class FaultKernelError extends Error {
  public abstract readonly code: FaultKernelErrorCode;
}

/** Invalid rates, thresholds or profile files. Fatal for a whole day run. */
export class ConfigurationError extends FaultKernelError {
  public readonly code = "CONFIGURATION_ERROR";
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Missing, empty or unreadable signal data for one device. */
export class InsufficientDataError extends FaultKernelError {
  public readonly code = "INSUFFICIENT_DATA";

  constructor(message: string) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

/** A rule layer produced something other than a mapping of booleans. */
export class MalformedFindingError extends FaultKernelError {
  public readonly code = "MALFORMED_FINDING";
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`${message} @ ${path}`);
    this.name = "MalformedFindingError";
    this.path = path;
  }
}

export function isFaultKernelError(e: unknown): e is FaultKernelError {
  return e instanceof FaultKernelError;
}
