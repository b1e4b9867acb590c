/**
 * Credential verifiers.
 *
 * PresenceCredentialVerifier accepts any non-empty credential. It is a
 * placeholder for development and tests and does not authenticate anyone.
 *
 * HmacCredentialVerifier accepts an HMAC-SHA256 of the authorization key
 * made with any secret in its signer set.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type {
  AuthorizationKey,
  Credential,
  CredentialBinding,
  CredentialVerifier,
} from "@authvault/types";

const HMAC_HEX_PATTERN = /^[0-9a-f]{64}$/;

export class PresenceCredentialVerifier implements CredentialVerifier {
  verify(credential: Credential): boolean {
    return credential.length > 0;
  }
}

/**
 * Issue a credential for a key. The counterpart of HmacCredentialVerifier.
 */
export function signAuthorization(
  secret: string,
  key: AuthorizationKey,
): Credential {
  return createHmac("sha256", secret).update(key).digest("hex");
}

export class HmacCredentialVerifier implements CredentialVerifier {
  private readonly secrets: readonly string[];

  constructor(secrets: readonly string[]) {
    if (secrets.length === 0) {
      throw new Error("HmacCredentialVerifier requires at least one signer secret");
    }
    if (secrets.some((s) => s.length === 0)) {
      throw new Error("Signer secrets cannot be empty");
    }
    this.secrets = [...secrets];
  }

  get signerCount(): number {
    return this.secrets.length;
  }

  verify(credential: Credential, binding: CredentialBinding): boolean {
    if (!HMAC_HEX_PATTERN.test(credential)) {
      return false;
    }

    const presented = Buffer.from(credential, "hex");
    return this.secrets.some((secret) =>
      timingSafeEqual(
        Buffer.from(signAuthorization(secret, binding.key), "hex"),
        presented,
      ),
    );
  }
}
