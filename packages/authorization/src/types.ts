/**
 * @authvault/authorization: Ledger types.
 */

import type { CredentialVerifier, SignalSink } from "@authvault/types";

export interface AuthorizationLedgerOptions {
  /** Identity of this ledger instance. Default: a random UUID-based id */
  readonly ledgerId?: string;

  /** Credential check. Default: PresenceCredentialVerifier */
  readonly verifier?: CredentialVerifier;

  /** Receives consumption and consumption-failure signals */
  readonly sink?: SignalSink;
}

/**
 * Persistable ledger state: the set of consumed keys.
 */
export interface AuthorizationLedgerSnapshot {
  readonly version: 1;
  readonly ledgerId: string;

  /** Consumed keys, sorted ascending */
  readonly consumedKeys: readonly string[];

  readonly savedAt: string;
}

export class AuthorizationLedgerError extends Error {
  public readonly code: AuthorizationLedgerErrorCode;
  constructor(code: AuthorizationLedgerErrorCode, message: string) {
    super(message);
    this.name = "AuthorizationLedgerError";
    this.code = code;
  }
}

export type AuthorizationLedgerErrorCode =
  | "UNSUPPORTED_SNAPSHOT_VERSION"
  | "INVALID_SNAPSHOT_KEY";
