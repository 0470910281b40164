/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f, v } with the field
 * name and the last position seen. List endpoints return
 * { data, pagination: { cursor, hasMore } }.
 */

import { z } from "zod";

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

const CursorSchema = z.object({
  f: z.string(),
  v: z.number().int(),
});

export function encodeCursor(field: string, value: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: value })).toString("base64url");
}

/**
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: number } | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(raw);
  return parsed.success ? { field: parsed.data.f, value: parsed.data.v } : undefined;
}

/**
 * Apply cursor-based pagination to an array sorted by `getKey` ascending.
 * A cursor issued for another field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.value;
      filtered = filtered.filter((item) => getKey(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data.at(-1);
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
