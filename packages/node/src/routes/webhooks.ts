/**
 * Webhook routes.
 *
 * POST /api/webhooks/track: Signed action delivery → pending reward
 *
 * Bodies over MAX_WEBHOOK_BODY_BYTES get a 413 before they are buffered.
 * The signature middleware runs next; nothing here executes for an
 * unsigned or mis-signed delivery.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { Logger } from "pino";
import { RewardError } from "@referral-rewards/rewards";
import type { TrackActionResult, WebhookSignatureVerifier } from "@referral-rewards/rewards";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { PAYLOAD_TOO_LARGE_MESSAGE } from "../middleware/error-handler.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import { webhookSignatureMiddleware } from "../middleware/webhook-signature.js";
import { presentReward } from "../presenters.js";
import type { TrackActionResponse } from "../presenters.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";

const MAX_IDEMPOTENCY_KEY_LENGTH = 255;

export const MAX_WEBHOOK_BODY_BYTES = 64 * 1024;

export interface WebhookRouteDeps {
  readonly verifier: WebhookSignatureVerifier;
  readonly logger?: Logger | undefined;
  readonly metrics?: MetricsCollector | undefined;
}

export function createWebhookRoutes(deps: WebhookRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const metrics = deps.metrics;

  routes.post(
    "/track",
    bodyLimit({
      maxSize: MAX_WEBHOOK_BODY_BYTES,
      onError: (c) =>
        c.json(createErrorEnvelope("PAYLOAD_TOO_LARGE", PAYLOAD_TOO_LARGE_MESSAGE), 413),
    }),
    webhookSignatureMiddleware(deps.verifier, { logger: deps.logger, metrics }),
    (c) => {
      const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
      if (
        idempotencyKey !== undefined &&
        (idempotencyKey.length === 0 || idempotencyKey.length > MAX_IDEMPOTENCY_KEY_LENGTH)
      ) {
        return c.json(
          createErrorEnvelope(
            "VALIDATION_ERROR",
            `${IDEMPOTENCY_HEADER} must be 1-${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
          ),
          400,
        );
      }

      let payload: unknown;
      try {
        payload = JSON.parse(c.get("webhookBody"));
      } catch {
        metrics?.incrementCounter("referral_rewards_actions_total", { result: "invalid" });
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }

      let result: TrackActionResult;
      try {
        result = c.get("program").trackAction(payload, { idempotencyKey });
      } catch (err) {
        if (err instanceof RewardError) {
          metrics?.incrementCounter("referral_rewards_actions_total", {
            result: err.code === "REFERRAL_NOT_FOUND" ? "unknown_code" : "invalid",
          });
        }
        throw err;
      }

      const { referral, reward, created } = result;
      metrics?.incrementCounter("referral_rewards_actions_total", {
        result: created ? "tracked" : "duplicate",
      });
      if (created) {
        metrics?.incrementCounter("referral_rewards_rewards_total", {
          action: reward.actionType,
        });
      }

      const data: TrackActionResponse = {
        status: created ? "tracked" : "duplicate",
        referral_code: referral.code,
        action: reward.actionType,
        reward_id: reward.id,
        reward: presentReward(reward),
      };
      return c.json({ data }, created ? 201 : 200);
    },
  );

  return routes;
}
