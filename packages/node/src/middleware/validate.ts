/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodType, ZodTypeDef } from "zod";
import { formatZodIssues } from "@referral-rewards/rewards";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate the JSON request body against a Zod schema.
 *
 * An empty body is passed to the schema as `undefined`, so schemas
 * with a default accept body-less requests.
 *
 * On success, sets `validatedBody` in context variables.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    const text = await c.req.text();

    let body: unknown;
    if (text.trim() !== "") {
      try {
        body = JSON.parse(text);
      } catch {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodIssues(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}
