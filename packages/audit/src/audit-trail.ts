/**
 * @authvault/audit: Hash-chained signal journal.
 *
 * Every signal a component emits is appended as an entry whose hash
 * covers its content and its predecessor's hash:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Editing, dropping or reordering any entry breaks the chain from that
 * point forward. In-memory only: survives as long as the process.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { SignalSink, SignalType, VaultSignal } from "@authvault/types";

// =============================================================================
// Types
// =============================================================================

export interface AuditEntry {
  /** 1-based, contiguous */
  readonly sequence: number;
  readonly recordedAt: string;
  readonly signal: VaultSignal;
  readonly previousHash: string;
  readonly hash: string;
}

export interface AuditQuery {
  readonly type?: SignalType | undefined;
  readonly limit?: number | undefined;
}

export interface AuditChainError {
  readonly sequence: number;
  readonly reason: string;
}

export interface AuditIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedSequence: number;
  readonly errors: readonly AuditChainError[];
}

// =============================================================================
// Hashing
// =============================================================================

export const GENESIS_HASH = "genesis";

export function computeEntryHash(
  entry: Pick<AuditEntry, "sequence" | "recordedAt" | "signal">,
  previousHash: string,
): string {
  const content = canonicalize({
    sequence: entry.sequence,
    recordedAt: entry.recordedAt,
    signal: entry.signal,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify a sequence of entries in recorded order.
 */
export function verifyAuditChain(
  entries: readonly AuditEntry[],
): AuditIntegrityResult {
  const errors: AuditChainError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedSequence = 0;

  entries.forEach((entry, index) => {
    const expectedSequence = index + 1;
    if (entry.sequence !== expectedSequence) {
      errors.push({
        sequence: entry.sequence,
        reason: `Sequence gap: expected ${expectedSequence}, got ${entry.sequence}`,
      });
    }

    if (entry.previousHash !== previousHash) {
      errors.push({
        sequence: entry.sequence,
        reason: `previousHash mismatch at ${entry.sequence}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeEntryHash(entry, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        sequence: entry.sequence,
        reason: `Hash mismatch at ${entry.sequence}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    previousHash = entry.hash;
    lastVerifiedSequence = entry.sequence;
  });

  return {
    valid: errors.length === 0,
    lastVerifiedSequence,
    errors,
  };
}

// =============================================================================
// AuditTrail
// =============================================================================

export class AuditTrail implements SignalSink {
  private readonly _entries: AuditEntry[] = [];
  private _lastHash = GENESIS_HASH;

  emit(signal: VaultSignal): void {
    const base = {
      sequence: this._entries.length + 1,
      recordedAt: new Date().toISOString(),
      signal,
    };
    const previousHash = this._lastHash;
    const hash = computeEntryHash(base, previousHash);

    this._entries.push({ ...base, previousHash, hash });
    this._lastHash = hash;
  }

  /**
   * Query entries with optional filters. Newest first.
   */
  query(filter?: AuditQuery): readonly AuditEntry[] {
    let results: AuditEntry[] = this._entries;

    if (filter?.type !== undefined) {
      results = results.filter((e) => e.signal.type === filter.type);
    }

    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  /**
   * All entries in recorded order.
   */
  entries(): readonly AuditEntry[] {
    return [...this._entries];
  }

  get size(): number {
    return this._entries.length;
  }

  get headHash(): string {
    return this._lastHash;
  }

  verifyIntegrity(): AuditIntegrityResult {
    return verifyAuditChain(this._entries);
  }
}
