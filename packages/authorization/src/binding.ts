/**
 * @authvault/authorization: Authorization key derivation.
 *
 * A key is SHA-256 over the RFC 8785 (JCS) canonical encoding of the
 * authorization tuple, tagged with a fixed domain-separation label:
 *
 *   key = sha256(canonicalize({ tag, vaultId, recipient, amount, authorizationId, domainId }))
 *
 * JCS sorts members, so the encoding is independent of how the tuple
 * was built. Addresses are lowercased: hex case is not part of identity.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AuthorizationKey, AuthorizationTuple } from "@authvault/types";

/**
 * Separates authorization keys from any other hash this system produces.
 * Bump the version when the encoding changes.
 */
export const AUTHORIZATION_DOMAIN_TAG = "authvault.authorization.v1";

/**
 * Canonical byte string for a tuple.
 */
export function encodeAuthorizationTuple(tuple: AuthorizationTuple): string {
  return canonicalize({
    tag: AUTHORIZATION_DOMAIN_TAG,
    vaultId: tuple.vaultId.toLowerCase(),
    recipient: tuple.recipient.toLowerCase(),
    amount: tuple.amount.toString(),
    authorizationId: tuple.authorizationId,
    domainId: tuple.domainId,
  });
}

/**
 * Derive the binding key for a tuple.
 *
 * @returns Hex-encoded SHA-256 digest
 */
export function deriveAuthorizationKey(
  tuple: AuthorizationTuple,
): AuthorizationKey {
  return createHash("sha256")
    .update(encodeAuthorizationTuple(tuple))
    .digest("hex");
}
