/**
 * Signal Types
 *
 * Structured observability records emitted by the vault and the ledger.
 * Signals feed external auditing; nothing reads them for control flow.
 *
 * Amounts are decimal strings so every sink can serialize them as JSON.
 */

import type { FailureCode } from "./result.js";

export interface VaultInitializedSignal {
  readonly type: "vault.initialized";
  readonly vaultId: string;
  readonly authorizationLedger: string;
}

export interface DepositSignal {
  readonly type: "vault.deposit";
  readonly vaultId: string;
  readonly depositor: string;
  readonly amount: string;
  readonly balance: string;
}

export interface WithdrawalSignal {
  readonly type: "vault.withdrawal";
  readonly vaultId: string;
  readonly recipient: string;
  readonly amount: string;
  readonly authorizationId: string;
  readonly key: string;
  readonly balance: string;
}

export interface WithdrawalFailedSignal {
  readonly type: "vault.withdrawal.failed";
  readonly vaultId: string;
  readonly recipient: string;
  readonly amount: string;
  readonly authorizationId: string;
  readonly code: FailureCode;
  readonly cause?: FailureCode;
  readonly reason: string;
}

export interface AuthorizationConsumedSignal {
  readonly type: "authorization.consumed";
  readonly ledgerId: string;
  readonly key: string;
  readonly vaultId: string;
  readonly recipient: string;
  readonly amount: string;
  readonly authorizationId: string;
  readonly domainId: string;
}

export interface AuthorizationFailedSignal {
  readonly type: "authorization.failed";
  readonly ledgerId: string;
  readonly key: string;
  readonly code: FailureCode;
  readonly reason: string;
}

/**
 * Any signal. Discriminated by `type`.
 */
export type VaultSignal =
  | VaultInitializedSignal
  | DepositSignal
  | WithdrawalSignal
  | WithdrawalFailedSignal
  | AuthorizationConsumedSignal
  | AuthorizationFailedSignal;

export type SignalType = VaultSignal["type"];

/**
 * Receives signals. Implementations must not throw.
 */
export interface SignalSink {
  emit(signal: VaultSignal): void;
}
