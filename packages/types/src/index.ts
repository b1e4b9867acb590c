/**
 * @authvault/types: Shared domain types for the vault stack.
 *
 * These types are used across all packages:
 * - Authorization tuples, keys and credentials
 * - Operation results and failure codes
 * - Observability signals
 * - Collaborator ports (verifier, transport, ledger)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Runtime code is limited to guards and result constructors
 */

// Authorization types
export type {
  Address,
  DomainId,
  AuthorizationId,
  AuthorizationKey,
  Credential,
  AuthorizationTuple,
  ConsumptionReceipt,
  CredentialBinding,
} from "./authorization.js";

// Results
export type { FailureCode, Failure, Result } from "./result.js";
export { ok, fail } from "./result.js";

// Signals
export type {
  VaultInitializedSignal,
  DepositSignal,
  WithdrawalSignal,
  WithdrawalFailedSignal,
  AuthorizationConsumedSignal,
  AuthorizationFailedSignal,
  VaultSignal,
  SignalType,
  SignalSink,
} from "./signal.js";

// Ports
export type {
  CredentialVerifier,
  FundsTransport,
  AuthorizationLedgerPort,
} from "./ports.js";

// Runtime type guards
export {
  isAddress,
  isAuthorizationKey,
  isAuthorizationTuple,
  isFailureCode,
  isAuthorizationLedgerPort,
} from "./guards.js";
