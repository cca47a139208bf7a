import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { isNotePMError } from "../errors.js";
import { noopLogger, type Logger } from "../logger.js";
import type { ToolRegistry } from "../tools/index.js";

export const SERVER_NAME = "notepm-mcp";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(registry: ToolRegistry, logger: Logger = noopLogger): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.toDefinitions(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    logger.info("tool call", { tool: name });

    try {
      return await registry.invoke(name, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("tool call failed", {
        tool: name,
        code: isNotePMError(error) ? error.code : "UNEXPECTED",
        error: message,
      });
      return {
        content: [{ type: "text" as const, text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  return server;
}
