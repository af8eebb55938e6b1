/**
 * Webhook signature middleware.
 *
 * Reads the raw body once, checks its HMAC against X-Webhook-Signature
 * and only then lets the request reach the store. The verified text is
 * handed to the route as `webhookBody`.
 *
 * Every rejection gets the same 401; the reason is only logged.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { WebhookSignatureVerifier } from "@referral-rewards/rewards";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { MetricsCollector } from "./metrics.js";

export const SIGNATURE_HEADER = "X-Webhook-Signature";

export interface WebhookSignatureOptions {
  readonly logger?: Logger | undefined;
  readonly metrics?: MetricsCollector | undefined;
}

export function webhookSignatureMiddleware(
  verifier: WebhookSignatureVerifier,
  options: WebhookSignatureOptions = {},
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const rawBody = new Uint8Array(await c.req.arrayBuffer());
    const check = verifier.check(rawBody, c.req.header(SIGNATURE_HEADER));

    if (!check.valid) {
      options.logger?.warn(
        { reason: check.reason, requestId: c.get("requestId") },
        "Webhook signature rejected",
      );
      options.metrics?.incrementCounter("referral_rewards_actions_total", {
        result: "rejected",
      });
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid webhook signature"),
        401,
      );
    }

    c.set("webhookBody", new TextDecoder().decode(rawBody));
    await next();
  };
}
