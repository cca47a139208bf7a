import { describe, it, expect } from "vitest";
import { truncateBodies, truncateText } from "../../notepm/truncate.js";
import type { JsonValue } from "../../notepm/types.js";

describe("truncateText", () => {
  it("cuts to the limit and appends an ellipsis", () => {
    expect(truncateText("0123456789ABCDEF", 10)).toBe("0123456789...");
  });

  it("returns text within the limit unchanged", () => {
    expect(truncateText("0123456789", 10)).toBe("0123456789");
    expect(truncateText("", 10)).toBe("");
  });

  it("produces limit + 3 characters when truncating", () => {
    const result = truncateText("x".repeat(500), 200);
    expect(result).toHaveLength(203);
    expect(result.endsWith("...")).toBe(true);
  });

  it("counts code points, not UTF-16 units", () => {
    // Each emoji is one code point but two UTF-16 units
    expect(truncateText("😀😀😀", 3)).toBe("😀😀😀");
    expect(truncateText("😀😀😀😀", 2)).toBe("😀😀...");
  });

  it("handles Japanese text", () => {
    expect(truncateText("議事録のテンプレート", 3)).toBe("議事録...");
  });
});

describe("truncateBodies", () => {
  it("truncates long bodies in search results", () => {
    const data: JsonValue = {
      pages: [{ page_code: "a1", body: "0123456789ABCDEF" }],
    };
    expect(truncateBodies(data, 10)).toEqual({
      pages: [{ page_code: "a1", body: "0123456789..." }],
    });
  });

  it("leaves short bodies and other fields untouched", () => {
    const data: JsonValue = {
      pages: [
        { page_code: "a1", title: "Budget", body: "short", tags: [{ name: "finance" }] },
        { page_code: "a2", body: "0123456789" },
      ],
      meta: { total: 2 },
    };
    expect(truncateBodies(data, 10)).toEqual({
      pages: [
        { page_code: "a1", title: "Budget", body: "short", tags: [{ name: "finance" }] },
        { page_code: "a2", body: "0123456789" },
      ],
      meta: { total: 2 },
    });
  });

  it("skips elements without a string body", () => {
    const data: JsonValue = {
      pages: [{ page_code: "a1" }, { body: 12345678901 }, { body: null }, "not-a-page", null],
    };
    expect(truncateBodies(data, 5)).toEqual({
      pages: [{ page_code: "a1" }, { body: 12345678901 }, { body: null }, "not-a-page", null],
    });
  });

  it("truncates the body of a single page object", () => {
    const data: JsonValue = { page: { page_code: "a1", body: "abcdefghij" } };
    expect(truncateBodies(data, 4)).toEqual({ page: { page_code: "a1", body: "abcd..." } });
  });

  it("prefers pages over page when both are present", () => {
    const data: JsonValue = {
      pages: [{ body: "abcdefghij" }],
      page: { body: "abcdefghij" },
    };
    expect(truncateBodies(data, 4)).toEqual({
      pages: [{ body: "abcd..." }],
      page: { body: "abcdefghij" },
    });
  });

  it("ignores a pages field that is not an array", () => {
    const data: JsonValue = { pages: { body: "abcdefghij" } };
    expect(truncateBodies(data, 4)).toEqual({ pages: { body: "abcdefghij" } });
  });

  it("is a no-op for non-object payloads", () => {
    expect(truncateBodies([{ body: "abcdefghij" }], 4)).toEqual([{ body: "abcdefghij" }]);
    expect(truncateBodies("abcdefghij", 4)).toBe("abcdefghij");
    expect(truncateBodies(null, 4)).toBeNull();
    expect(truncateBodies({}, 4)).toEqual({});
  });

  it("mutates and returns the same object", () => {
    const data: JsonValue = { pages: [{ body: "abcdefghij" }] };
    expect(truncateBodies(data, 4)).toBe(data);
  });
});
