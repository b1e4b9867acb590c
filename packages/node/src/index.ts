/**
 * @authvault/node: Deployment tooling for the vault stack.
 *
 * Provides:
 * - Zod-validated configuration from environment variables
 * - pino logger factory
 * - deploy(), which binds a Vault to a fresh AuthorizationLedger
 * - An in-process FundsTransport
 *
 * @packageDocumentation
 */

export { ConfigSchema, loadConfig, parseSignerSecrets } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger } from "./logger.js";

export { deploy, writeDeploymentSummary } from "./deploy.js";
export type { DeployOptions, Deployment, DeploymentSummary } from "./deploy.js";

export { InMemoryFundsTransport } from "./transport.js";
export type {
  InMemoryFundsTransportOptions,
  TransferRecord,
} from "./transport.js";
