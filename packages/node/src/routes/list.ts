/**
 * Shared handling for paginated list endpoints.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PaginationQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { creationKey, paginate } from "../types/pagination.js";

const CURSOR_FIELD = "createdAt#id";

/** Code-unit order, the same order the cursor filter uses */
function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Respond with one page of records ordered by creation time.
 */
export function respondWithPage<T extends { readonly createdAt: string; readonly id: string }, R>(
  c: Context<AppEnv>,
  items: readonly T[],
  present: (item: T) => R,
): Response {
  const queryResult = PaginationQuerySchema.safeParse(c.req.query());
  if (!queryResult.success) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
      400,
    );
  }

  const sorted = [...items].sort((a, b) => compareKeys(creationKey(a), creationKey(b)));
  const page = paginate(sorted, queryResult.data, creationKey, CURSOR_FIELD);

  return c.json({
    data: page.data.map(present),
    pagination: page.pagination,
  });
}
