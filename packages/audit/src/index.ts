/**
 * @authvault/audit: Observability sinks for vault and ledger signals.
 *
 * Provides:
 * - AuditTrail, a tamper-evident in-memory signal journal
 * - PinoSignalSink for structured logs
 * - FanoutSignalSink to feed several sinks at once
 *
 * @packageDocumentation
 */

export type {
  AuditEntry,
  AuditQuery,
  AuditChainError,
  AuditIntegrityResult,
} from "./audit-trail.js";
export {
  AuditTrail,
  GENESIS_HASH,
  computeEntryHash,
  verifyAuditChain,
} from "./audit-trail.js";

export { PinoSignalSink, FanoutSignalSink } from "./sinks.js";
