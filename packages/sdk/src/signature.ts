/**
 * Webhook signing for senders.
 *
 * The server verifies the lowercase hex HMAC-SHA256 of the exact body
 * bytes it receives, so callers must sign the string they send.
 */

import { createHmac } from "node:crypto";

/** Header carrying the body signature */
export const SIGNATURE_HEADER = "X-Webhook-Signature";

/** Header carrying the delivery's deduplication key */
export const IDEMPOTENCY_HEADER = "Idempotency-Key";

export function signWebhookBody(secret: string, body: string): string {
  if (secret.length === 0) {
    throw new Error("Cannot sign a webhook body with an empty secret");
  }
  return createHmac("sha256", secret).update(body).digest("hex");
}
