/**
 * VaultError: exception form of a failed Result, for callers that
 * prefer throwing (bootstrap scripts, one-shot tooling).
 */

import type { Failure, FailureCode, Result } from "@authvault/types";

export class VaultError extends Error {
  public readonly code: FailureCode;
  public readonly failureCause: FailureCode | undefined;

  constructor(failure: Failure) {
    super(failure.message);
    this.name = "VaultError";
    this.code = failure.code;
    this.failureCause = failure.cause;
  }
}

/**
 * Return the value of a successful result, or throw its failure as a VaultError.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new VaultError(result.error);
  }
  return result.value;
}
