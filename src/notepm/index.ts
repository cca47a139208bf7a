export { NotePMClient, buildSearchQuery } from "./client.js";
export type { NotePMClientConfig } from "./client.js";
export { truncateBodies, truncateText, ELLIPSIS } from "./truncate.js";
export * from "./types.js";
