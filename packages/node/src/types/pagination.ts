/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { field, value }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { isRecord } from "@referral-rewards/types";

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: string; // last seen value
}

/**
 * Encode a cursor from field name and last seen value.
 */
export function encodeCursor(field: string, value: string): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen value.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: string } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (isRecord(data) && typeof data["f"] === "string" && typeof data["v"] === "string") {
    return { field: data["f"], value: data["v"] };
  }
  return undefined;
}

/**
 * Sort key for records listed by creation time.
 *
 * Ties on createdAt are broken by id so that every key is unique.
 */
export function creationKey(item: { readonly createdAt: string; readonly id: string }): string {
  return `${item.createdAt}#${item.id}`;
}

/**
 * Apply cursor-based pagination to a sorted array.
 *
 * Items must be sorted by the cursor field in ascending order.
 * Returns the page items, next cursor, and hasMore flag.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getField: (item: T) => string,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  // Apply cursor filter
  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const cursorValue = decoded.value;
      filtered = filtered.filter((item) => getField(item) > cursorValue);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data.at(-1);
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getField(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
