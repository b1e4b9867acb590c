/**
 * Authorization Types
 *
 * The values that scope a single-use withdrawal permission.
 *
 * Rules:
 * - An authorization is bound to one exact tuple
 *   (vault, recipient, amount, authorizationId, domain)
 * - The binding key is one-way: it is only ever compared for equality
 * - Amounts are unsigned integers in the vault's smallest unit
 */

/**
 * Account address (0x-prefixed, 20 bytes hex).
 */
export type Address = string;

/**
 * Deployment or network context (e.g., "eip155:1", "eip155:31337").
 * Part of every binding so credentials never cross environments.
 */
export type DomainId = string;

/**
 * Caller-chosen nonce that distinguishes otherwise identical grants.
 */
export type AuthorizationId = string;

/**
 * Hex-encoded SHA-256 binding of an authorization tuple.
 */
export type AuthorizationKey = string;

/**
 * Opaque proof presented with a withdrawal.
 * Its meaning belongs to whichever CredentialVerifier is installed.
 */
export type Credential = string;

/**
 * The exact grant an authorization covers.
 */
export interface AuthorizationTuple {
  /** Identity of the vault the funds leave */
  readonly vaultId: Address;

  /** Address the funds go to */
  readonly recipient: Address;

  /** Amount in smallest units */
  readonly amount: bigint;

  readonly authorizationId: AuthorizationId;

  readonly domainId: DomainId;
}

/**
 * Returned by a ledger when an authorization is consumed.
 */
export interface ConsumptionReceipt {
  readonly key: AuthorizationKey;
  readonly tuple: AuthorizationTuple;
}

/**
 * What a credential is checked against: the derived key and the tuple it binds.
 */
export interface CredentialBinding {
  readonly key: AuthorizationKey;
  readonly tuple: AuthorizationTuple;
}
