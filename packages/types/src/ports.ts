/**
 * Collaborator Ports
 *
 * Interfaces the vault and the ledger depend on but do not implement:
 * credential verification, outbound transfers, and the ledger itself
 * as seen from the vault.
 */

import type {
  Address,
  AuthorizationTuple,
  ConsumptionReceipt,
  Credential,
  CredentialBinding,
} from "./authorization.js";
import type { Result } from "./result.js";

/**
 * Decides whether a credential authorizes a binding.
 *
 * A deployment supplies a cryptographically sound implementation
 * (e.g. signatures over the key from an authorized signer set).
 */
export interface CredentialVerifier {
  verify(
    credential: Credential,
    binding: CredentialBinding,
  ): boolean | Promise<boolean>;
}

/**
 * Moves funds out of the vault.
 * A rejected promise (or a throw) means the transfer did not happen.
 */
export interface FundsTransport {
  transfer(recipient: Address, amount: bigint): Promise<void>;
}

/**
 * The ledger surface a vault is allowed to call.
 */
export interface AuthorizationLedgerPort {
  readonly ledgerId: string;

  tryConsume(
    tuple: AuthorizationTuple,
    credential: Credential,
  ): Promise<Result<ConsumptionReceipt>>;

  isConsumed(tuple: AuthorizationTuple): boolean;
}
