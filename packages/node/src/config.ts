/**
 * @authvault/node: Configuration.
 *
 * Loads and validates deployment configuration from environment
 * variables using Zod.
 */

import { z } from "zod";
import { isAddress } from "@authvault/types";

// =============================================================================
// Schema
// =============================================================================

const address = (name: string) =>
  z.string().refine(isAddress, {
    message: `${name} must be a non-zero 0x-prefixed 20-byte hex address`,
  });

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Network
  NETWORK_ID: z
    .string()
    .regex(/^[-a-z0-9]{3,8}:[-_a-zA-Z0-9]{1,32}$/, "NETWORK_ID must be a CAIP-2 chain id")
    .default("eip155:31337"),
  NETWORK_NAME: z.string().min(1).default("localhost"),

  // Components
  VAULT_ADDRESS: address("VAULT_ADDRESS"),
  DEPLOYER_ADDRESS: address("DEPLOYER_ADDRESS"),

  // Authorization
  SIGNER_SECRETS: z.string().default(""),

  // Output
  DEPLOYMENT_FILE: z.string().min(1).default("deployments/authvault.json"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Signer Secret Parsing
// =============================================================================

/**
 * Parse the SIGNER_SECRETS env var into a list of secrets.
 *
 * Format: "secret1,secret2"
 */
export function parseSignerSecrets(raw: string): readonly string[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry, index) => {
    const secret = entry.trim();
    if (secret === "") {
      throw new Error(
        `Invalid SIGNER_SECRETS entry at position ${index + 1}: secret cannot be empty`,
      );
    }
    return secret;
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
