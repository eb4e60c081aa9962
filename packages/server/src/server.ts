#!/usr/bin/env node

/**
 * MCP server for the contact book
 * Exposes contact create/update/delete/search via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { openStore } from "@contactbook/store";
import { loadConfig } from "./config.js";
import { ContactService } from "./service/contacts.js";
import { createMcpServer } from "./mcp.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  // MCP protocol uses stdout; the store's logger traces through console.debug
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[${method}]`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = loadConfig();

  if (!config.enabled) {
    console.error("Contact book server is disabled (CONTACTBOOK_ENABLED=false)");
    process.exit(0);
  }

  logger.setLevel(config.logLevel);

  // The store lives exactly as long as the server
  const store = openStore({ searchMode: config.searchMode });
  const service = new ContactService(store);
  const server = createMcpServer(service, config);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    search_mode: config.searchMode,
    max_batch: config.maxBatch,
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await server.close();
    service.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
