/**
 * AuthorizationLedger: exactly-once consumption of authorizations.
 *
 * Records which authorization keys have been spent. A key moves from
 * unconsumed to consumed once and never back; there is no delete and
 * no reset.
 *
 * tryConsume order:
 * 1. Derive the key from the tuple (domain id included)
 * 2. Already consumed → REPLAY_REJECTED
 * 3. Credential rejected by the verifier → INVALID_CREDENTIAL
 * 4. Consumed while the verifier ran → REPLAY_REJECTED
 * 5. Mark consumed → receipt
 *
 * Steps 1-5 run under the ledger's SerialLock, so concurrent calls for
 * one key cannot both pass step 2 even while a verifier is awaiting.
 * A verifier that calls back into the ledger runs inside the lock;
 * step 4 catches it consuming the same key.
 */

import { randomUUID } from "node:crypto";
import { fail, isAuthorizationKey, ok } from "@authvault/types";
import type {
  AuthorizationKey,
  AuthorizationLedgerPort,
  AuthorizationTuple,
  ConsumptionReceipt,
  Credential,
  CredentialVerifier,
  FailureCode,
  Result,
  SignalSink,
} from "@authvault/types";
import { deriveAuthorizationKey } from "./binding.js";
import { SerialLock } from "./serial-lock.js";
import { PresenceCredentialVerifier } from "./verifier.js";
import { AuthorizationLedgerError } from "./types.js";
import type {
  AuthorizationLedgerOptions,
  AuthorizationLedgerSnapshot,
} from "./types.js";

// =============================================================================
// Ledger
// =============================================================================

export class AuthorizationLedger implements AuthorizationLedgerPort {
  readonly ledgerId: string;
  private readonly consumed = new Set<AuthorizationKey>();
  private readonly verifier: CredentialVerifier;
  private readonly sink: SignalSink | undefined;
  private readonly lock = new SerialLock();

  constructor(options: AuthorizationLedgerOptions = {}) {
    this.ledgerId = options.ledgerId ?? `ledger-${randomUUID()}`;
    this.verifier = options.verifier ?? new PresenceCredentialVerifier();
    this.sink = options.sink;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Consumption
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Consume the authorization for a tuple, at most once.
   */
  tryConsume(
    tuple: AuthorizationTuple,
    credential: Credential,
  ): Promise<Result<ConsumptionReceipt>> {
    return this.lock.run(async () => {
      const key = deriveAuthorizationKey(tuple);

      if (this.consumed.has(key)) {
        return this.rejectReplay(key, tuple);
      }

      let accepted: boolean;
      try {
        accepted = await this.verifier.verify(credential, { key, tuple });
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        return this.reject(
          key,
          "INVALID_CREDENTIAL",
          `Credential verification failed: ${reason}`,
        );
      }

      if (!accepted) {
        return this.reject(
          key,
          "INVALID_CREDENTIAL",
          `Credential rejected for authorization ${tuple.authorizationId}`,
        );
      }

      if (this.consumed.has(key)) {
        return this.rejectReplay(key, tuple);
      }

      this.consumed.add(key);
      this.sink?.emit({
        type: "authorization.consumed",
        ledgerId: this.ledgerId,
        key,
        vaultId: tuple.vaultId,
        recipient: tuple.recipient,
        amount: tuple.amount.toString(),
        authorizationId: tuple.authorizationId,
        domainId: tuple.domainId,
      });

      return ok({ key, tuple });
    });
  }

  /**
   * Whether the tuple's authorization has been consumed. No side effects.
   */
  isConsumed(tuple: AuthorizationTuple): boolean {
    return this.consumed.has(deriveAuthorizationKey(tuple));
  }

  /**
   * Number of consumed authorizations.
   */
  get consumedCount(): number {
    return this.consumed.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): AuthorizationLedgerSnapshot {
    return {
      version: 1,
      ledgerId: this.ledgerId,
      consumedKeys: [...this.consumed].sort(),
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Build a fresh ledger that already holds a snapshot's consumed keys.
   * The snapshot's ledger id is kept; verifier and sink come from options.
   */
  static fromSnapshot(
    snapshot: AuthorizationLedgerSnapshot,
    options: Omit<AuthorizationLedgerOptions, "ledgerId"> = {},
  ): AuthorizationLedger {
    if (snapshot.version !== 1) {
      throw new AuthorizationLedgerError(
        "UNSUPPORTED_SNAPSHOT_VERSION",
        `Unsupported ledger snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new AuthorizationLedger({
      ...options,
      ledgerId: snapshot.ledgerId,
    });

    for (const key of snapshot.consumedKeys) {
      if (!isAuthorizationKey(key)) {
        throw new AuthorizationLedgerError(
          "INVALID_SNAPSHOT_KEY",
          `Invalid authorization key in snapshot: "${key}"`,
        );
      }
      ledger.consumed.add(key);
    }

    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private rejectReplay(
    key: AuthorizationKey,
    tuple: AuthorizationTuple,
  ): Result<ConsumptionReceipt> {
    return this.reject(
      key,
      "REPLAY_REJECTED",
      `Authorization ${tuple.authorizationId} has already been consumed`,
    );
  }

  private reject(
    key: AuthorizationKey,
    code: FailureCode,
    reason: string,
  ): Result<ConsumptionReceipt> {
    this.sink?.emit({
      type: "authorization.failed",
      ledgerId: this.ledgerId,
      key,
      code,
      reason,
    });
    return fail(code, reason);
  }
}
