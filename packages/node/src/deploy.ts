/**
 * @authvault/node: Deployment.
 *
 * Wires an AuthorizationLedger to a Vault, initializes the binding,
 * verifies it and describes the result as a DeploymentSummary.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";
import type {
  Address,
  CredentialVerifier,
  FundsTransport,
  SignalSink,
} from "@authvault/types";
import {
  AuthorizationLedger,
  HmacCredentialVerifier,
  PresenceCredentialVerifier,
} from "@authvault/authorization";
import { FanoutSignalSink, PinoSignalSink } from "@authvault/audit";
import { Vault, unwrap } from "@authvault/vault";
import { parseSignerSecrets } from "./config.js";
import type { AppConfig } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export interface DeploymentSummary {
  readonly network: {
    readonly id: string;
    readonly name: string;
    readonly timestamp: string;
  };
  readonly components: {
    readonly authorizationLedger: string;
    readonly vault: {
      readonly address: Address;
      readonly authorizationLedger: string;
    };
  };
  readonly deployer: Address;
}

export interface DeployOptions {
  readonly logger: Logger;
  readonly transport: FundsTransport;
  /** Extra sink fed alongside the log sink, e.g. an AuditTrail */
  readonly sink?: SignalSink;
  readonly now?: () => Date;
}

export interface Deployment {
  readonly ledger: AuthorizationLedger;
  readonly vault: Vault;
  readonly summary: DeploymentSummary;
}

// =============================================================================
// Deploy
// =============================================================================

export async function deploy(
  config: AppConfig,
  options: DeployOptions,
): Promise<Deployment> {
  const log = options.logger.child({ component: "deploy" });
  const now = options.now ?? (() => new Date());

  log.info(
    { network: config.NETWORK_ID, deployer: config.DEPLOYER_ADDRESS },
    "Deploying authorization ledger and vault",
  );

  const logSink = new PinoSignalSink(options.logger);
  const sink =
    options.sink !== undefined
      ? new FanoutSignalSink([logSink, options.sink])
      : logSink;

  const ledger = new AuthorizationLedger({
    verifier: createVerifier(config, log),
    sink,
  });
  log.info({ ledgerId: ledger.ledgerId }, "AuthorizationLedger created");

  const vault = new Vault({
    vaultId: config.VAULT_ADDRESS,
    domainId: config.NETWORK_ID,
    transport: options.transport,
    sink,
  });
  log.info({ vault: vault.vaultId }, "Vault created");

  unwrap(await vault.initialize(ledger));
  if (!vault.isInitialized() || vault.authorizationLedgerId !== ledger.ledgerId) {
    throw new Error(`Vault ${vault.vaultId} did not bind to ledger ${ledger.ledgerId}`);
  }
  log.info("Vault initialized with AuthorizationLedger");

  const summary: DeploymentSummary = {
    network: {
      id: config.NETWORK_ID,
      name: config.NETWORK_NAME,
      timestamp: now().toISOString(),
    },
    components: {
      authorizationLedger: ledger.ledgerId,
      vault: {
        address: vault.vaultId,
        authorizationLedger: ledger.ledgerId,
      },
    },
    deployer: config.DEPLOYER_ADDRESS,
  };

  return { ledger, vault, summary };
}

/**
 * Persist a summary as pretty-printed JSON, creating parent directories.
 */
export async function writeDeploymentSummary(
  path: string,
  summary: DeploymentSummary,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(summary, null, 2)}\n`, "utf8");
}

// =============================================================================
// Helpers
// =============================================================================

function createVerifier(config: AppConfig, log: Logger): CredentialVerifier {
  const secrets = parseSignerSecrets(config.SIGNER_SECRETS);
  if (secrets.length > 0) {
    log.info({ signerCount: secrets.length }, "HMAC credential verifier configured");
    return new HmacCredentialVerifier(secrets);
  }
  log.warn("No SIGNER_SECRETS configured, accepting any non-empty credential");
  return new PresenceCredentialVerifier();
}
