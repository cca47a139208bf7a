import type { Config } from "./config.js";
import type { Logger } from "./logger.js";
import { NotePMClient } from "./notepm/index.js";
import { ToolRegistry, createPageDetailTool, createSearchTool } from "./tools/index.js";

export function createNotePMClient(config: Config, logger?: Logger): NotePMClient {
  return new NotePMClient({
    apiBase: config.apiBase,
    apiToken: config.apiToken,
    maxBodyLength: config.maxBodyLength,
    requestTimeoutMs: config.requestTimeoutMs,
    logger,
  });
}

export function createToolRegistry(config: Config, client: NotePMClient): ToolRegistry {
  return new ToolRegistry()
    .register(createSearchTool(client, config.searchDescription))
    .register(createPageDetailTool(client, config.pageDetailDescription));
}
