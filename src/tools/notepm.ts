import type { NotePMClient } from "../notepm/client.js";
import {
  detailParamsSchema,
  searchParamsSchema,
  type DetailParams,
  type JsonValue,
  type SearchParams,
} from "../notepm/types.js";
import type { Tool } from "./types.js";

export const SEARCH_TOOL_NAME = "search";
export const PAGE_DETAIL_TOOL_NAME = "pageDetail";

export const DEFAULT_SEARCH_DESCRIPTION = `Search pages in NotePM with the given query.
Search words are combined with AND; natural-language queries are not supported.
Results are returned as JSON.
Long page bodies are shortened in search results. Use ${PAGE_DETAIL_TOOL_NAME} with a page code to get the full text.`;

export const DEFAULT_PAGE_DETAIL_DESCRIPTION =
  "Get the full content of the NotePM page identified by the given page code.";

export function createSearchTool(
  client: NotePMClient,
  description: string = DEFAULT_SEARCH_DESCRIPTION
): Tool<SearchParams, JsonValue> {
  return {
    name: SEARCH_TOOL_NAME,
    description,
    inputSchema: searchParamsSchema,
    execute: (params) => client.search(params),
  };
}

export function createPageDetailTool(
  client: NotePMClient,
  description: string = DEFAULT_PAGE_DETAIL_DESCRIPTION
): Tool<DetailParams, string> {
  return {
    name: PAGE_DETAIL_TOOL_NAME,
    description,
    inputSchema: detailParamsSchema,
    execute: (params) => client.getPageDetail(params),
  };
}
