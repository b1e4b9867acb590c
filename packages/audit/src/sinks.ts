/**
 * Signal sinks backed by pino, plus fan-out to several sinks.
 */

import type { Logger } from "pino";
import type { SignalSink, VaultSignal } from "@authvault/types";

const FAILURE_TYPES = new Set<VaultSignal["type"]>([
  "authorization.failed",
  "vault.withdrawal.failed",
]);

/**
 * Writes each signal as one structured log line.
 * Failures log at warn, everything else at info.
 */
export class PinoSignalSink implements SignalSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "signals" });
  }

  emit(signal: VaultSignal): void {
    if (FAILURE_TYPES.has(signal.type)) {
      this.logger.warn({ signal }, signal.type);
    } else {
      this.logger.info({ signal }, signal.type);
    }
  }
}

export class FanoutSignalSink implements SignalSink {
  private readonly sinks: readonly SignalSink[];

  constructor(sinks: readonly SignalSink[]) {
    this.sinks = [...sinks];
  }

  emit(signal: VaultSignal): void {
    for (const sink of this.sinks) {
      sink.emit(signal);
    }
  }
}
