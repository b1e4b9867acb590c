/**
 * In-process funds transport.
 *
 * Records every transfer instead of moving real value. Recipients in the
 * reject list fail the way a reverting recipient would.
 */

import type { Address, FundsTransport } from "@authvault/types";

export interface TransferRecord {
  readonly recipient: Address;
  readonly amount: bigint;
}

export interface InMemoryFundsTransportOptions {
  readonly rejectRecipients?: Iterable<Address>;
}

export class InMemoryFundsTransport implements FundsTransport {
  private readonly records: TransferRecord[] = [];
  private readonly rejected: Set<string>;

  constructor(options: InMemoryFundsTransportOptions = {}) {
    this.rejected = new Set(
      [...(options.rejectRecipients ?? [])].map((r) => r.toLowerCase()),
    );
  }

  async transfer(recipient: Address, amount: bigint): Promise<void> {
    if (this.rejected.has(recipient.toLowerCase())) {
      throw new Error(`Recipient ${recipient} rejected the transfer`);
    }
    this.records.push({ recipient, amount });
  }

  get transfers(): readonly TransferRecord[] {
    return [...this.records];
  }

  get totalTransferred(): bigint {
    return this.records.reduce((sum, r) => sum + r.amount, 0n);
  }
}
