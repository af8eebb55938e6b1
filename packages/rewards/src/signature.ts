/**
 * Webhook signature verification.
 *
 * Inbound webhooks carry the HMAC-SHA256 of their exact body bytes,
 * keyed with a shared secret and rendered as lowercase hex.
 *
 * Rules:
 * - The digest is computed over the raw bytes as received, never a
 *   re-serialized body
 * - No secret, or a blank one, means every request is rejected
 * - Digests are compared with crypto.timingSafeEqual
 */

import { createHmac, timingSafeEqual } from "node:crypto";

/** Hex length of an HMAC-SHA256 digest */
export const SIGNATURE_HEX_LENGTH = 64;

const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/;

export type SignatureRejection =
  | "secret_unconfigured"
  | "missing_signature"
  | "malformed_signature"
  | "mismatch";

export type SignatureCheck =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: SignatureRejection };

/**
 * Compute the lowercase hex HMAC-SHA256 of a body.
 */
export function signWebhookBody(
  secret: string,
  body: string | Uint8Array,
): string {
  return createHmac("sha256", secret).update(body).digest("hex");
}

/**
 * Verifies webhook signatures against one shared secret.
 *
 * The secret is injected at construction; instances hold no other state.
 */
export class WebhookSignatureVerifier {
  private readonly secret: string | undefined;

  constructor(secret: string | undefined) {
    this.secret = secret !== undefined && secret.trim().length > 0 ? secret : undefined;
  }

  /** Whether a non-blank secret was supplied. */
  get configured(): boolean {
    return this.secret !== undefined;
  }

  /**
   * Check a signature and report why it was rejected.
   */
  check(
    rawBody: string | Uint8Array,
    signature: string | undefined,
  ): SignatureCheck {
    if (this.secret === undefined) {
      return { valid: false, reason: "secret_unconfigured" };
    }
    if (signature === undefined || signature.length === 0) {
      return { valid: false, reason: "missing_signature" };
    }
    if (!SIGNATURE_PATTERN.test(signature)) {
      return { valid: false, reason: "malformed_signature" };
    }

    const expected = Buffer.from(signWebhookBody(this.secret, rawBody), "hex");
    const provided = Buffer.from(signature, "hex");

    if (!timingSafeEqual(expected, provided)) {
      return { valid: false, reason: "mismatch" };
    }
    return { valid: true };
  }

  verify(rawBody: string | Uint8Array, signature: string | undefined): boolean {
    return this.check(rawBody, signature).valid;
  }
}
