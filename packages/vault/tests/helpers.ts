/**
 * Shared fixtures for vault tests.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import type { FundsTransport, SignalSink, VaultSignal } from "@authvault/types";
import { AuthorizationLedger } from "@authvault/authorization";
import { Vault } from "../src/vault.js";

export const VAULT_ID = "0x1111111111111111111111111111111111111111";
export const DOMAIN_ID = "eip155:31337";
export const RECIPIENT_X = "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
export const RECIPIENT_Y = "0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";
export const DEPOSITOR = "0xdddddddddddddddddddddddddddddddddddddddd";

export function recordingSink(): SignalSink & { signals: VaultSignal[] } {
  const signals: VaultSignal[] = [];
  return {
    signals,
    emit: (signal) => {
      signals.push(signal);
    },
  };
}

export function okTransport(): { transfer: Mock } {
  return { transfer: vi.fn().mockResolvedValue(undefined) };
}

export interface Fixture {
  readonly vault: Vault;
  readonly ledger: AuthorizationLedger;
  readonly sink: ReturnType<typeof recordingSink>;
}

/**
 * An initialized vault bound to a fresh ledger (presence verifier).
 */
export async function createFixture(transport: FundsTransport): Promise<Fixture> {
  const sink = recordingSink();
  const ledger = new AuthorizationLedger({ ledgerId: "ledger-1" });
  const vault = new Vault({
    vaultId: VAULT_ID,
    domainId: DOMAIN_ID,
    transport,
    sink,
  });
  await vault.initialize(ledger);
  return { vault, ledger, sink };
}

export function tupleFor(
  recipient: string,
  amount: bigint,
  authorizationId: string,
) {
  return {
    vaultId: VAULT_ID,
    recipient,
    amount,
    authorizationId,
    domainId: DOMAIN_ID,
  };
}

export function deferred(): {
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: Error) => void;
} {
  let resolve: () => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
