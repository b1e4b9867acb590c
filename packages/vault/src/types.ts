/**
 * Vault Types
 *
 * Domain types for the authorization-governed vault.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigint in smallest units; snapshots carry decimal strings
 * - Funds leave only through an authorization the ledger has consumed
 */

import type {
  Address,
  AuthorizationId,
  AuthorizationKey,
  DomainId,
  FundsTransport,
  SignalSink,
} from "@authvault/types";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultOptions {
  /** This vault's identity (part of every authorization binding) */
  readonly vaultId: Address;

  /** Deployment context the vault binds authorizations to */
  readonly domainId: DomainId;

  /** Moves funds to recipients */
  readonly transport: FundsTransport;

  /** Receives deposit, withdrawal and initialization signals */
  readonly sink?: SignalSink;
}

// =============================================================================
// Operation results
// =============================================================================

export interface VaultInitialization {
  readonly vaultId: Address;
  readonly authorizationLedger: string;
}

export interface DepositReceipt {
  readonly depositor: Address;
  readonly amount: bigint;
  readonly balance: bigint;
}

export interface WithdrawalReceipt {
  readonly recipient: Address;
  readonly amount: bigint;
  readonly authorizationId: AuthorizationId;
  readonly key: AuthorizationKey;
  readonly balance: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface VaultSnapshot {
  readonly version: 1;
  readonly vaultId: Address;
  readonly domainId: DomainId;
  readonly initialized: boolean;
  readonly authorizationLedger: string | null;
  readonly balance: string;

  /** Informational per-depositor totals */
  readonly deposits: Readonly<Record<Address, string>>;

  readonly savedAt: string;
}
