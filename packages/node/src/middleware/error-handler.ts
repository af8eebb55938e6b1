/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * RewardError codes map onto HTTP statuses; anything else is an
 * internal error and is logged, never echoed to the client.
 */

import type { ErrorHandler, NotFoundHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { RewardError } from "@referral-rewards/rewards";
import type { RewardErrorCode } from "@referral-rewards/rewards";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Record<RewardErrorCode, ContentfulStatusCode> = {
  VALIDATION_FAILED: 400,
  CAMPAIGN_NOT_FOUND: 404,
  REFERRAL_NOT_FOUND: 404,
  REWARD_NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  CODE_GENERATION_FAILED: 500,
};

const INTERNAL_MESSAGE = "Internal server error";

export const PAYLOAD_TOO_LARGE_MESSAGE = "Request body too large";

/** Name of the error hono/body-limit raises when a streamed body overruns */
const BODY_LIMIT_ERROR_NAME = "BodyLimitError";

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    const requestId = c.get("requestId");

    if (err instanceof RewardError) {
      const status = STATUS_MAP[err.code];
      if (status !== 500) {
        return c.json(createErrorEnvelope(err.code, err.message, err.details), status);
      }
    }

    if (err.name === BODY_LIMIT_ERROR_NAME) {
      return c.json(createErrorEnvelope("PAYLOAD_TOO_LARGE", PAYLOAD_TOO_LARGE_MESSAGE), 413);
    }

    logger?.error({ err, requestId }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", INTERNAL_MESSAGE), 500);
  };
}

/**
 * 404 for paths no route matched.
 */
export const handleNotFound: NotFoundHandler<AppEnv> = (c) => {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
};
