export * from "./types.js";
export { ToolRegistry } from "./registry.js";
export {
  createSearchTool,
  createPageDetailTool,
  SEARCH_TOOL_NAME,
  PAGE_DETAIL_TOOL_NAME,
  DEFAULT_SEARCH_DESCRIPTION,
  DEFAULT_PAGE_DETAIL_DESCRIPTION,
} from "./notepm.js";
