/**
 * Result Types
 *
 * Every vault and ledger operation reports its outcome as a value.
 * A failed operation has no lasting effect on the component that ran it.
 */

/**
 * Failure codes across the vault and the authorization ledger.
 */
export type FailureCode =
  | "REPLAY_REJECTED"       // Authorization already consumed
  | "INVALID_CREDENTIAL"    // Credential rejected by the verifier
  | "ALREADY_INITIALIZED"   // Vault already bound to a ledger
  | "INVALID_REFERENCE"     // Ledger reference missing or malformed
  | "NOT_INITIALIZED"       // Vault has no ledger yet
  | "INVALID_RECIPIENT"     // Recipient is not a usable address
  | "ZERO_VALUE"            // Amount is not greater than zero
  | "INSUFFICIENT_FUNDS"    // Amount exceeds the vault balance
  | "AUTHORIZATION_DENIED"  // Ledger refused to consume the authorization
  | "TRANSFER_FAILED";      // Outbound transfer rejected or errored

export interface Failure {
  readonly code: FailureCode;

  /** Human-readable reason */
  readonly message: string;

  /** Underlying failure, when this one wraps another (e.g. AUTHORIZATION_DENIED ← REPLAY_REJECTED) */
  readonly cause?: FailureCode;
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  code: FailureCode,
  message: string,
  cause?: FailureCode,
): Result<T> {
  const error: Failure = cause !== undefined
    ? { code, message, cause }
    : { code, message };
  return { ok: false, error };
}
