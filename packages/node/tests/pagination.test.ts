/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import { encodeCursor, decodeCursor, paginate } from "../src/types/pagination.js";

describe("decodeCursor", () => {
  it("reads back what encodeCursor wrote", () => {
    const cursor = encodeCursor("requestedAt", "2025-01-01T00:00:00.000Z|w-1");

    expect(decodeCursor(cursor)).toEqual({ field: "requestedAt", value: "2025-01-01T00:00:00.000Z|w-1" });
  });

  it("returns undefined for garbage", () => {
    expect(decodeCursor("!!!not-base64!!!")).toBeUndefined();
    expect(decodeCursor(Buffer.from("not json").toString("base64url"))).toBeUndefined();
  });

  it("returns undefined when fields are missing or not strings", () => {
    expect(decodeCursor(Buffer.from(JSON.stringify({ f: "id" })).toString("base64url"))).toBeUndefined();
    expect(decodeCursor(Buffer.from(JSON.stringify({ f: "id", v: 3 })).toString("base64url"))).toBeUndefined();
    expect(decodeCursor(Buffer.from(JSON.stringify([1, 2])).toString("base64url"))).toBeUndefined();
  });
});

interface Row {
  readonly at: string;
  readonly id: string;
}

const rows: Row[] = [
  { at: "2025-01-01T00:00:00.000Z", id: "a" },
  { at: "2025-01-01T00:00:00.000Z", id: "b" },
  { at: "2025-01-01T00:00:01.000Z", id: "c" },
  { at: "2025-01-01T00:00:02.000Z", id: "d" },
];

const key = (r: Row) => `${r.at}|${r.id}`;

describe("paginate", () => {
  it("walks every row exactly once, ties broken by id", () => {
    const first = paginate(rows, { limit: 3 }, key, "at");
    expect(first.data.map((r) => r.id)).toEqual(["a", "b", "c"]);
    expect(first.pagination.hasMore).toBe(true);

    const second = paginate(rows, { limit: 3, cursor: first.pagination.cursor ?? "" }, key, "at");
    expect(second.data.map((r) => r.id)).toEqual(["d"]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("returns everything without a next cursor when it fits", () => {
    const result = paginate(rows, { limit: 10 }, key, "at");

    expect(result.data).toHaveLength(4);
    expect(result.pagination.cursor).toBeNull();
  });

  it("ignores a cursor minted for another field", () => {
    const foreign = encodeCursor("createdAt", "2025-01-01T00:00:01.000Z|c");

    const result = paginate(rows, { limit: 10, cursor: foreign }, key, "at");

    expect(result.data).toHaveLength(4);
  });

  it("handles an empty list", () => {
    expect(paginate([], { limit: 5 }, key, "at")).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});
