/**
 * @authvault/vault: Authorization-governed vault.
 *
 * Holds pooled funds and releases them only against single-use
 * authorizations consumed by an @authvault/authorization ledger.
 *
 * Design rules:
 * - Verify before effect: no debit and no transfer without consumption
 * - Effects before interactions: the balance is debited before transfer
 * - All-or-nothing: a failed transfer restores the account
 * - Operations return Results; unwrap() converts a failure to VaultError
 */

export { Vault } from "./vault.js";
export { VaultError, unwrap } from "./errors.js";

export type {
  VaultOptions,
  VaultInitialization,
  DepositReceipt,
  WithdrawalReceipt,
  VaultSnapshot,
} from "./types.js";
