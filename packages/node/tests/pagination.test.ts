/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("round-trips with encodeCursor", () => {
    expect(decodeCursor(encodeCursor("globalPosition", 12))).toEqual({
      field: "globalPosition",
      value: 12,
    });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when decoded JSON lacks required fields", () => {
    const missingV = Buffer.from(JSON.stringify({ f: "ok" })).toString("base64url");
    expect(decodeCursor(missingV)).toBeUndefined();

    const missingF = Buffer.from(JSON.stringify({ v: 3 })).toString("base64url");
    expect(decodeCursor(missingF)).toBeUndefined();
  });

  it("returns undefined for a non-integer position", () => {
    const text = Buffer.from(JSON.stringify({ f: "version", v: "3" })).toString("base64url");
    expect(decodeCursor(text)).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    const arr = Buffer.from(JSON.stringify([1, 2])).toString("base64url");
    expect(decodeCursor(arr)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

interface Item {
  position: number;
}

const items: Item[] = Array.from({ length: 12 }, (_, i) => ({ position: i + 1 }));

const getPosition = (item: Item) => item.position;

describe("paginate", () => {
  it("returns first page with hasMore when items exceed limit", () => {
    const result = paginate(items, { limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 1 }, { position: 2 }]);
    expect(result.pagination).toEqual({
      cursor: encodeCursor("position", 2),
      hasMore: true,
    });
  });

  it("returns all items when limit exceeds array length", () => {
    const result = paginate(items, { limit: 20 }, getPosition, "position");

    expect(result.data).toEqual(items);
    expect(result.pagination.hasMore).toBe(false);
    expect(result.pagination.cursor).toBeNull();
  });

  it("compares positions as numbers across digit boundaries", () => {
    const cursor = encodeCursor("position", 9);
    const result = paginate(items, { cursor, limit: 5 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 10 }, { position: 11 }, { position: 12 }]);
    expect(result.pagination.hasMore).toBe(false);
  });

  it("ignores a cursor issued for another field", () => {
    const cursor = encodeCursor("version", 10);
    const result = paginate(items, { cursor, limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 1 }, { position: 2 }]);
  });

  it("ignores invalid cursor and returns from start", () => {
    const result = paginate(items, { cursor: "garbage", limit: 3 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 1 }, { position: 2 }, { position: 3 }]);
  });

  it("returns empty result for empty items", () => {
    const result = paginate([], { limit: 5 }, getPosition, "position");

    expect(result.data).toEqual([]);
    expect(result.pagination.hasMore).toBe(false);
    expect(result.pagination.cursor).toBeNull();
  });
});
