import type { JsonObject, JsonValue } from "./types.js";

export const ELLIPSIS = "...";

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Shortens a string to `maxLength` code points plus an ellipsis.
 * Strings within the limit are returned as-is.
 */
export function truncateText(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) return text;
  return codePoints.slice(0, maxLength).join("") + ELLIPSIS;
}

function truncatePageBody(page: JsonValue, maxLength: number): void {
  if (!isJsonObject(page)) return;
  const body = page.body;
  if (typeof body === "string") {
    page.body = truncateText(body, maxLength);
  }
}

/**
 * Bounds the size of a search response by shortening every page `body`
 * longer than `maxLength`. Looks at `pages` (search results) first, then a
 * single `page` object. Anything else is left alone.
 *
 * Mutates and returns `data`.
 */
export function truncateBodies(data: JsonValue, maxLength: number): JsonValue {
  if (!isJsonObject(data)) return data;

  const { pages, page } = data;
  if (Array.isArray(pages)) {
    for (const item of pages) {
      truncatePageBody(item, maxLength);
    }
  } else if (isJsonObject(page)) {
    truncatePageBody(page, maxLength);
  }

  return data;
}
