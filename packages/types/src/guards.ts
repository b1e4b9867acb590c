/**
 * Runtime Type Guards
 *
 * Narrowing functions for vault domain types.
 * Used at the boundaries where values arrive from callers
 * (recipients, ledger references, persisted snapshots).
 */

import type { Address, AuthorizationKey, AuthorizationTuple } from "./authorization.js";
import type { FailureCode } from "./result.js";
import type { AuthorizationLedgerPort } from "./ports.js";

// =============================================================================
// Addresses & keys
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const ZERO_ADDRESS_PATTERN = /^0x0{40}$/;
const KEY_PATTERN = /^[0-9a-f]{64}$/;

/**
 * A well-formed, non-zero address.
 */
export function isAddress(value: unknown): value is Address {
  return (
    typeof value === "string" &&
    ADDRESS_PATTERN.test(value) &&
    !ZERO_ADDRESS_PATTERN.test(value)
  );
}

export function isAuthorizationKey(value: unknown): value is AuthorizationKey {
  return typeof value === "string" && KEY_PATTERN.test(value);
}

export function isAuthorizationTuple(value: unknown): value is AuthorizationTuple {
  if (value === null || typeof value !== "object") return false;
  return (
    "vaultId" in value && typeof value.vaultId === "string" &&
    "recipient" in value && typeof value.recipient === "string" &&
    "amount" in value && typeof value.amount === "bigint" &&
    "authorizationId" in value && typeof value.authorizationId === "string" &&
    "domainId" in value && typeof value.domainId === "string"
  );
}

// =============================================================================
// Failures
// =============================================================================

const FAILURE_CODES = new Set<string>([
  "REPLAY_REJECTED",
  "INVALID_CREDENTIAL",
  "ALREADY_INITIALIZED",
  "INVALID_REFERENCE",
  "NOT_INITIALIZED",
  "INVALID_RECIPIENT",
  "ZERO_VALUE",
  "INSUFFICIENT_FUNDS",
  "AUTHORIZATION_DENIED",
  "TRANSFER_FAILED",
]);

export function isFailureCode(value: unknown): value is FailureCode {
  return typeof value === "string" && FAILURE_CODES.has(value);
}

// =============================================================================
// Ports
// =============================================================================

/**
 * Structural check for something a vault can be bound to.
 */
export function isAuthorizationLedgerPort(
  value: unknown,
): value is AuthorizationLedgerPort {
  if (value === null || typeof value !== "object") return false;
  return (
    "ledgerId" in value &&
    typeof value.ledgerId === "string" &&
    value.ledgerId.length > 0 &&
    "tryConsume" in value &&
    typeof value.tryConsume === "function" &&
    "isConsumed" in value &&
    typeof value.isConsumed === "function"
  );
}
