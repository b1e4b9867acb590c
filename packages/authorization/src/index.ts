/**
 * @authvault/authorization: Single-use authorization ledger.
 *
 * Provides:
 * - Deterministic, domain-separated key derivation for authorization tuples
 * - AuthorizationLedger with atomic check-and-consume
 * - Pluggable credential verifiers (presence placeholder, HMAC signer set)
 * - SerialLock, the per-component unit-of-work lock
 *
 * @packageDocumentation
 */

export {
  AUTHORIZATION_DOMAIN_TAG,
  encodeAuthorizationTuple,
  deriveAuthorizationKey,
} from "./binding.js";

export { AuthorizationLedger } from "./ledger.js";
export { AuthorizationLedgerError } from "./types.js";
export type {
  AuthorizationLedgerOptions,
  AuthorizationLedgerSnapshot,
  AuthorizationLedgerErrorCode,
} from "./types.js";

export {
  PresenceCredentialVerifier,
  HmacCredentialVerifier,
  signAuthorization,
} from "./verifier.js";

export { SerialLock } from "./serial-lock.js";
