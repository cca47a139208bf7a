#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CliUsageError, HELP_TEXT, parseArgs, type CliOptions } from "./cli.js";
import { loadConfig, type Config } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, levelFromVerbosity } from "./logger.js";
import { createMcpServer } from "./mcp-server/index.js";
import { createNotePMClient, createToolRegistry } from "./setup.js";
import { initTracing, shutdownTracing } from "./tracing.js";

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(HELP_TEXT);
      process.exit(2);
    }
    throw error;
  }

  if (options.help) {
    console.error(HELP_TEXT);
    return;
  }

  const bootLogger = createLogger({ level: levelFromVerbosity(options.verbosity) });

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      bootLogger.error(error.message, { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }

  const logger = config.logLevel
    ? createLogger({ level: config.logLevel })
    : bootLogger;

  await initTracing();

  const client = createNotePMClient(config, logger);
  const server = createMcpServer(createToolRegistry(config, client), logger);

  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    await server.close();
    await shutdownTracing();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
    });
  }

  await server.connect(new StdioServerTransport());
  logger.info("NotePM MCP server running on stdio", {
    team: config.team,
    maxBodyLength: config.maxBodyLength,
  });
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
