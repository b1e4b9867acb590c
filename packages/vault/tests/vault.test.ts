/**
 * Tests for Vault: initialization, deposits, withdrawal preconditions,
 * the authorization gate, transfer rollback, signals and snapshots.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AuthorizationLedgerPort } from "@authvault/types";
import { AuthorizationLedger } from "@authvault/authorization";
import { Vault } from "../src/vault.js";
import {
  DEPOSITOR,
  DOMAIN_ID,
  RECIPIENT_X,
  RECIPIENT_Y,
  VAULT_ID,
  createFixture,
  okTransport,
  recordingSink,
  tupleFor,
} from "./helpers.js";

// =============================================================================
// Initialization
// =============================================================================

describe("initialize", () => {
  let vault: Vault;
  let sink: ReturnType<typeof recordingSink>;

  beforeEach(() => {
    sink = recordingSink();
    vault = new Vault({
      vaultId: VAULT_ID,
      domainId: DOMAIN_ID,
      transport: okTransport(),
      sink,
    });
  });

  it("starts uninitialized", () => {
    expect(vault.isInitialized()).toBe(false);
    expect(vault.authorizationLedgerId).toBeUndefined();
  });

  it("binds a ledger once", async () => {
    const result = await vault.initialize(new AuthorizationLedger({ ledgerId: "ledger-1" }));

    expect(result).toEqual({
      ok: true,
      value: { vaultId: VAULT_ID, authorizationLedger: "ledger-1" },
    });
    expect(vault.isInitialized()).toBe(true);
    expect(sink.signals).toEqual([
      { type: "vault.initialized", vaultId: VAULT_ID, authorizationLedger: "ledger-1" },
    ]);
  });

  it("rejects a second initialization and keeps the first ledger", async () => {
    await vault.initialize(new AuthorizationLedger({ ledgerId: "ledger-1" }));
    const second = await vault.initialize(new AuthorizationLedger({ ledgerId: "ledger-2" }));

    expect(second).toEqual({
      ok: false,
      error: {
        code: "ALREADY_INITIALIZED",
        message: `Vault ${VAULT_ID} is already bound to ledger ledger-1`,
      },
    });
    expect(vault.authorizationLedgerId).toBe("ledger-1");
  });

  it("rejects a missing reference", async () => {
    for (const missing of [null, undefined]) {
      const result = await vault.initialize(missing);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("INVALID_REFERENCE");
      }
    }
    expect(vault.isInitialized()).toBe(false);
  });

  it("rejects a malformed reference", async () => {
    const malformed: AuthorizationLedgerPort = {
      ledgerId: "",
      tryConsume: vi.fn(),
      isConsumed: vi.fn(),
    };

    const result = await vault.initialize(malformed);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_REFERENCE");
    }
    expect(sink.signals).toEqual([]);
  });
});

// =============================================================================
// Deposit
// =============================================================================

describe("deposit", () => {
  it("increments the balance and the depositor's total", async () => {
    const { vault } = await createFixture(okTransport());

    const result = await vault.deposit(DEPOSITOR, 250n);

    expect(result).toEqual({
      ok: true,
      value: { depositor: DEPOSITOR, amount: 250n, balance: 250n },
    });
    expect(vault.getBalance()).toBe(250n);
    expect(vault.getDepositOf(DEPOSITOR)).toBe(250n);
  });

  it("accumulates per depositor", async () => {
    const { vault } = await createFixture(okTransport());

    await vault.deposit(DEPOSITOR, 100n);
    await vault.deposit(RECIPIENT_Y, 40n);
    await vault.deposit(DEPOSITOR, 60n);

    expect(vault.getBalance()).toBe(200n);
    expect(vault.getDepositOf(DEPOSITOR)).toBe(160n);
    expect(vault.getDepositOf(RECIPIENT_Y)).toBe(40n);
    expect(vault.getDepositOf(RECIPIENT_X)).toBe(0n);
  });

  it("treats depositor addresses case-insensitively", async () => {
    const { vault } = await createFixture(okTransport());
    const mixed = "0xDdDdDdDdDdDdDdDdDdDdDdDdDdDdDdDdDdDdDdDd";

    await vault.deposit(DEPOSITOR, 100n);
    await vault.deposit(mixed, 25n);

    expect(vault.getDepositOf(DEPOSITOR)).toBe(125n);
    expect(vault.getDepositOf(mixed)).toBe(125n);
    expect(vault.snapshot().deposits).toEqual({ [DEPOSITOR]: "125" });
  });

  it("rejects zero and negative amounts", async () => {
    const { vault } = await createFixture(okTransport());

    expect(await vault.deposit(DEPOSITOR, 0n)).toEqual({
      ok: false,
      error: { code: "ZERO_VALUE", message: "Deposit amount must be greater than zero, got 0" },
    });
    const negative = await vault.deposit(DEPOSITOR, -5n);
    expect(negative.ok).toBe(false);
    expect(vault.getBalance()).toBe(0n);
  });

  it("accepts deposits before initialization", async () => {
    const vault = new Vault({ vaultId: VAULT_ID, domainId: DOMAIN_ID, transport: okTransport() });
    const result = await vault.deposit(DEPOSITOR, 10n);
    expect(result.ok).toBe(true);
    expect(vault.getBalance()).toBe(10n);
  });

  it("emits a deposit signal", async () => {
    const { vault, sink } = await createFixture(okTransport());
    await vault.deposit(DEPOSITOR, 75n);

    expect(sink.signals.at(-1)).toEqual({
      type: "vault.deposit",
      vaultId: VAULT_ID,
      depositor: DEPOSITOR,
      amount: "75",
      balance: "75",
    });
  });
});

// =============================================================================
// Withdraw: preconditions
// =============================================================================

describe("withdraw preconditions", () => {
  it("requires initialization first", async () => {
    const vault = new Vault({ vaultId: VAULT_ID, domainId: DOMAIN_ID, transport: okTransport() });
    await vault.deposit(DEPOSITOR, 100n);

    const result = await vault.withdraw("not-an-address", 0n, "1", "");

    expect(result).toEqual({
      ok: false,
      error: { code: "NOT_INITIALIZED", message: `Vault ${VAULT_ID} is not initialized` },
    });
  });

  it("checks the recipient before the amount", async () => {
    const { vault } = await createFixture(okTransport());

    const result = await vault.withdraw("not-an-address", 0n, "1", "cred");

    expect(result).toEqual({
      ok: false,
      error: { code: "INVALID_RECIPIENT", message: 'Invalid recipient address: "not-an-address"' },
    });
  });

  it("rejects the zero address", async () => {
    const { vault } = await createFixture(okTransport());
    const result = await vault.withdraw("0x0000000000000000000000000000000000000000", 1n, "1", "cred");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_RECIPIENT");
    }
  });

  it("checks the amount before funds", async () => {
    const { vault } = await createFixture(okTransport());

    const result = await vault.withdraw(RECIPIENT_X, 0n, "1", "cred");

    expect(result).toEqual({
      ok: false,
      error: { code: "ZERO_VALUE", message: "Withdrawal amount must be greater than zero, got 0" },
    });
  });

  it("rejects amounts above the balance", async () => {
    const { vault } = await createFixture(okTransport());
    await vault.deposit(DEPOSITOR, 100n);

    const result = await vault.withdraw(RECIPIENT_X, 101n, "1", "cred");

    expect(result).toEqual({
      ok: false,
      error: { code: "INSUFFICIENT_FUNDS", message: "Insufficient funds: requested 101, available 100" },
    });
    expect(vault.getBalance()).toBe(100n);
  });

  it("never reaches the ledger when a precondition fails", async () => {
    const { vault, ledger } = await createFixture(okTransport());
    const spy = vi.spyOn(ledger, "tryConsume");

    await vault.withdraw(RECIPIENT_X, 1n, "1", "cred");
    await vault.withdraw("bad", 1n, "1", "cred");

    expect(spy).not.toHaveBeenCalled();
    expect(ledger.consumedCount).toBe(0);
  });
});

// =============================================================================
// Withdraw: protocol
// =============================================================================

describe("withdraw", () => {
  it("consumes, debits and transfers", async () => {
    const transport = okTransport();
    const { vault, ledger } = await createFixture(transport);
    await vault.deposit(DEPOSITOR, 1000n);

    const result = await vault.withdraw(RECIPIENT_X, 400n, "1", "valid-credential");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.balance).toBe(600n);
      expect(result.value.amount).toBe(400n);
      expect(result.value.key).toMatch(/^[0-9a-f]{64}$/);
    }
    expect(vault.getBalance()).toBe(600n);
    expect(transport.transfer).toHaveBeenCalledWith(RECIPIENT_X, 400n);
    expect(ledger.isConsumed(tupleFor(RECIPIENT_X, 400n, "1"))).toBe(true);
  });

  it("binds the vault identity and domain into the authorization", async () => {
    const { vault, ledger } = await createFixture(okTransport());
    const spy = vi.spyOn(ledger, "tryConsume");
    await vault.deposit(DEPOSITOR, 10n);

    await vault.withdraw(RECIPIENT_X, 10n, "7", "cred");

    expect(spy).toHaveBeenCalledWith(tupleFor(RECIPIENT_X, 10n, "7"), "cred");
  });

  it("leaves informational deposits untouched", async () => {
    const { vault } = await createFixture(okTransport());
    await vault.deposit(DEPOSITOR, 500n);
    await vault.withdraw(RECIPIENT_X, 200n, "1", "cred");
    expect(vault.getDepositOf(DEPOSITOR)).toBe(500n);
  });

  it("denies without debit or transfer when the ledger refuses", async () => {
    const transport = okTransport();
    const { vault, sink } = await createFixture(transport);
    await vault.deposit(DEPOSITOR, 1000n);

    const result = await vault.withdraw(RECIPIENT_X, 100n, "1", "");

    expect(result).toEqual({
      ok: false,
      error: {
        code: "AUTHORIZATION_DENIED",
        message: "Authorization denied: Credential rejected for authorization 1",
        cause: "INVALID_CREDENTIAL",
      },
    });
    expect(vault.getBalance()).toBe(1000n);
    expect(transport.transfer).not.toHaveBeenCalled();
    expect(sink.signals.at(-1)).toEqual({
      type: "vault.withdrawal.failed",
      vaultId: VAULT_ID,
      recipient: RECIPIENT_X,
      amount: "100",
      authorizationId: "1",
      code: "AUTHORIZATION_DENIED",
      cause: "INVALID_CREDENTIAL",
      reason: "Authorization denied: Credential rejected for authorization 1",
    });
  });

  it("restores the balance when the transfer fails, keeping the authorization spent", async () => {
    const transport = okTransport();
    transport.transfer.mockRejectedValueOnce(new Error("recipient rejected funds"));
    const { vault, ledger, sink } = await createFixture(transport);
    await vault.deposit(DEPOSITOR, 1000n);

    const result = await vault.withdraw(RECIPIENT_X, 400n, "1", "cred");

    expect(result).toEqual({
      ok: false,
      error: {
        code: "TRANSFER_FAILED",
        message: `Transfer of 400 to ${RECIPIENT_X} failed: recipient rejected funds`,
      },
    });
    expect(vault.getBalance()).toBe(1000n);
    expect(ledger.isConsumed(tupleFor(RECIPIENT_X, 400n, "1"))).toBe(true);
    expect(sink.signals.at(-1)?.type).toBe("vault.withdrawal.failed");

    const retry = await vault.withdraw(RECIPIENT_X, 400n, "1", "cred");
    expect(retry.ok).toBe(false);
    if (!retry.ok) {
      expect(retry.error.cause).toBe("REPLAY_REJECTED");
    }
  });

  it("reports non-Error transfer failures", async () => {
    const transport = okTransport();
    transport.transfer.mockRejectedValueOnce("connection reset");
    const { vault } = await createFixture(transport);
    await vault.deposit(DEPOSITOR, 10n);

    const result = await vault.withdraw(RECIPIENT_X, 10n, "1", "cred");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        `Transfer of 10 to ${RECIPIENT_X} failed: connection reset`,
      );
    }
  });

  it("emits a success signal with recipient, amount and authorization id", async () => {
    const { vault, sink } = await createFixture(okTransport());
    await vault.deposit(DEPOSITOR, 50n);

    const result = await vault.withdraw(RECIPIENT_X, 20n, "9", "cred");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(sink.signals.at(-1)).toEqual({
        type: "vault.withdrawal",
        vaultId: VAULT_ID,
        recipient: RECIPIENT_X,
        amount: "20",
        authorizationId: "9",
        key: result.value.key,
        balance: "30",
      });
    }
  });

  it("never lets the balance go negative", async () => {
    const { vault } = await createFixture(okTransport());
    await vault.deposit(DEPOSITOR, 30n);

    await vault.withdraw(RECIPIENT_X, 30n, "1", "cred");
    const overdraw = await vault.withdraw(RECIPIENT_X, 1n, "2", "cred");

    expect(vault.getBalance()).toBe(0n);
    expect(overdraw.ok).toBe(false);
  });
});

// =============================================================================
// Snapshot
// =============================================================================

describe("snapshot", () => {
  it("captures balance, deposits and binding", async () => {
    const { vault } = await createFixture(okTransport());
    await vault.deposit(RECIPIENT_Y, 5n);
    await vault.deposit(DEPOSITOR, 10n);
    await vault.withdraw(RECIPIENT_X, 3n, "1", "cred");

    const snapshot = vault.snapshot();

    expect(snapshot.version).toBe(1);
    expect(snapshot.vaultId).toBe(VAULT_ID);
    expect(snapshot.domainId).toBe(DOMAIN_ID);
    expect(snapshot.initialized).toBe(true);
    expect(snapshot.authorizationLedger).toBe("ledger-1");
    expect(snapshot.balance).toBe("12");
    expect(snapshot.deposits).toEqual({ [RECIPIENT_Y]: "5", [DEPOSITOR]: "10" });
    expect(Object.keys(snapshot.deposits)).toEqual([RECIPIENT_Y, DEPOSITOR]);
  });

  it("reports an unbound vault", () => {
    const vault = new Vault({ vaultId: VAULT_ID, domainId: DOMAIN_ID, transport: okTransport() });
    const snapshot = vault.snapshot();
    expect(snapshot.initialized).toBe(false);
    expect(snapshot.authorizationLedger).toBeNull();
    expect(snapshot.balance).toBe("0");
  });
});
