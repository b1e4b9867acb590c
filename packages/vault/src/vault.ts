/**
 * Vault: custody of pooled funds, gated by an authorization ledger.
 *
 * The vault is the only component that moves funds, and it moves them
 * only after its bound AuthorizationLedger has consumed an authorization
 * for the exact (vault, recipient, amount, authorizationId, domain) tuple.
 *
 * withdraw follows checks → effects → interactions:
 * 1. Preconditions, in order: NOT_INITIALIZED, INVALID_RECIPIENT,
 *    ZERO_VALUE, INSUFFICIENT_FUNDS
 * 2. Ledger consumption; anything but success → AUTHORIZATION_DENIED
 * 3. Debit the balance
 * 4. Transfer; failure → TRANSFER_FAILED and this withdrawal's debit is
 *    returned (the authorization stays consumed)
 *
 * Every mutating operation runs under the vault's SerialLock. A transfer
 * collaborator that calls back into the vault runs inside the current
 * operation and sees the debited balance and the consumed authorization.
 * Callers outside the operation see the last committed account until it
 * finishes.
 */

import {
  fail,
  isAddress,
  isAuthorizationLedgerPort,
  ok,
} from "@authvault/types";
import type {
  Address,
  AuthorizationId,
  AuthorizationLedgerPort,
  AuthorizationTuple,
  Credential,
  DomainId,
  FailureCode,
  FundsTransport,
  Result,
  SignalSink,
} from "@authvault/types";
import { SerialLock } from "@authvault/authorization";
import type {
  DepositReceipt,
  VaultInitialization,
  VaultOptions,
  VaultSnapshot,
  WithdrawalReceipt,
} from "./types.js";

// =============================================================================
// Account state
// =============================================================================

interface VaultAccount {
  readonly balance: bigint;
  /** Keyed by lowercased depositor address */
  readonly deposits: ReadonlyMap<Address, bigint>;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly vaultId: Address;
  readonly domainId: DomainId;
  private readonly transport: FundsTransport;
  private readonly sink: SignalSink | undefined;
  private readonly lock = new SerialLock();

  private ledger: AuthorizationLedgerPort | undefined;
  private account: VaultAccount = { balance: 0n, deposits: new Map() };

  /** Committed account while a withdrawal's transfer is in flight */
  private committed: VaultAccount | undefined;

  constructor(options: VaultOptions) {
    this.vaultId = options.vaultId;
    this.domainId = options.domainId;
    this.transport = options.transport;
    this.sink = options.sink;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Initialization
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Bind the vault to its authorization ledger. One-shot and irreversible.
   */
  initialize(
    ledger: AuthorizationLedgerPort | null | undefined,
  ): Promise<Result<VaultInitialization>> {
    return this.lock.run(() => {
      if (this.ledger !== undefined) {
        return fail(
          "ALREADY_INITIALIZED",
          `Vault ${this.vaultId} is already bound to ledger ${this.ledger.ledgerId}`,
        );
      }
      if (!isAuthorizationLedgerPort(ledger)) {
        return fail(
          "INVALID_REFERENCE",
          "Authorization ledger reference is missing or malformed",
        );
      }

      this.ledger = ledger;
      this.sink?.emit({
        type: "vault.initialized",
        vaultId: this.vaultId,
        authorizationLedger: ledger.ledgerId,
      });

      return ok({ vaultId: this.vaultId, authorizationLedger: ledger.ledgerId });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit an inbound transfer to the vault balance and the depositor's total.
   */
  deposit(depositor: Address, amount: bigint): Promise<Result<DepositReceipt>> {
    return this.lock.run(() => {
      if (amount <= 0n) {
        return fail(
          "ZERO_VALUE",
          `Deposit amount must be greater than zero, got ${amount}`,
        );
      }

      const deposits = new Map(this.account.deposits);
      const holder = depositor.toLowerCase();
      deposits.set(holder, (deposits.get(holder) ?? 0n) + amount);
      this.account = { balance: this.account.balance + amount, deposits };

      this.sink?.emit({
        type: "vault.deposit",
        vaultId: this.vaultId,
        depositor,
        amount: amount.toString(),
        balance: this.account.balance.toString(),
      });

      return ok({ depositor, amount, balance: this.account.balance });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdraw
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Withdraw against a single-use authorization.
   */
  withdraw(
    recipient: Address,
    amount: bigint,
    authorizationId: AuthorizationId,
    credential: Credential,
  ): Promise<Result<WithdrawalReceipt>> {
    return this.lock.run(async () => {
      const ledger = this.ledger;
      if (ledger === undefined) {
        return fail("NOT_INITIALIZED", `Vault ${this.vaultId} is not initialized`);
      }
      if (!isAddress(recipient)) {
        return fail("INVALID_RECIPIENT", `Invalid recipient address: "${recipient}"`);
      }
      if (amount <= 0n) {
        return fail(
          "ZERO_VALUE",
          `Withdrawal amount must be greater than zero, got ${amount}`,
        );
      }
      if (this.account.balance < amount) {
        return fail(
          "INSUFFICIENT_FUNDS",
          `Insufficient funds: requested ${amount}, available ${this.account.balance}`,
        );
      }

      const tuple: AuthorizationTuple = {
        vaultId: this.vaultId,
        recipient,
        amount,
        authorizationId,
        domainId: this.domainId,
      };

      const consumption = await ledger.tryConsume(tuple, credential);
      if (!consumption.ok) {
        return this.rejectWithdrawal(
          tuple,
          "AUTHORIZATION_DENIED",
          `Authorization denied: ${consumption.error.message}`,
          consumption.error.code,
        );
      }

      // Only a ledger calling back into the vault can move the balance here.
      // The authorization is already consumed and stays consumed: a retry
      // needs a fresh one.
      if (this.account.balance < amount) {
        return this.rejectWithdrawal(
          tuple,
          "INSUFFICIENT_FUNDS",
          `Insufficient funds: requested ${amount}, available ${this.account.balance}`,
        );
      }

      // Effects
      const outermost = this.committed === undefined;
      if (outermost) {
        this.committed = this.account;
      }
      this.account = { ...this.account, balance: this.account.balance - amount };

      // Interaction
      try {
        await this.transport.transfer(recipient, amount);
      } catch (err: unknown) {
        // Return only this debit; re-entrant deposits and delivered
        // withdrawals made during the transfer stand.
        this.account = { ...this.account, balance: this.account.balance + amount };
        const reason = err instanceof Error ? err.message : String(err);
        return this.rejectWithdrawal(
          tuple,
          "TRANSFER_FAILED",
          `Transfer of ${amount} to ${recipient} failed: ${reason}`,
        );
      } finally {
        if (outermost) {
          this.committed = undefined;
        }
      }

      this.sink?.emit({
        type: "vault.withdrawal",
        vaultId: this.vaultId,
        recipient,
        amount: amount.toString(),
        authorizationId,
        key: consumption.value.key,
        balance: this.account.balance.toString(),
      });

      return ok({
        recipient,
        amount,
        authorizationId,
        key: consumption.value.key,
        balance: this.account.balance,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  getBalance(): bigint {
    return this.view().balance;
  }

  isInitialized(): boolean {
    return this.ledger !== undefined;
  }

  /**
   * Total deposited by one depositor. Informational; not a withdrawal limit.
   */
  getDepositOf(depositor: Address): bigint {
    return this.view().deposits.get(depositor.toLowerCase()) ?? 0n;
  }

  get authorizationLedgerId(): string | undefined {
    return this.ledger?.ledgerId;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VaultSnapshot {
    const account = this.view();
    const deposits: Record<Address, string> = {};
    for (const [depositor, total] of [...account.deposits].sort(([a], [b]) =>
      a.localeCompare(b),
    )) {
      deposits[depositor] = total.toString();
    }

    return {
      version: 1,
      vaultId: this.vaultId,
      domainId: this.domainId,
      initialized: this.isInitialized(),
      authorizationLedger: this.ledger?.ledgerId ?? null,
      balance: account.balance.toString(),
      deposits,
      savedAt: new Date().toISOString(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Live account inside an operation, committed account outside one.
   */
  private view(): VaultAccount {
    if (this.committed !== undefined && !this.lock.held) {
      return this.committed;
    }
    return this.account;
  }

  private rejectWithdrawal(
    tuple: AuthorizationTuple,
    code: FailureCode,
    reason: string,
    cause?: FailureCode,
  ): Result<WithdrawalReceipt> {
    const base = {
      type: "vault.withdrawal.failed" as const,
      vaultId: this.vaultId,
      recipient: tuple.recipient,
      amount: tuple.amount.toString(),
      authorizationId: tuple.authorizationId,
      code,
      reason,
    };
    this.sink?.emit(cause !== undefined ? { ...base, cause } : base);
    return fail(code, reason, cause);
  }
}
