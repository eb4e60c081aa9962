/**
 * MCP server wiring for the contact book
 * Registers tool listing and tool calls over an explicitly owned service
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { ContactService } from "./service/contacts.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./service/contacts.js";
import type { ServerConfig } from "./config.js";
import { toolDefinitions, createToolHandlers, isToolName, READ_ONLY_TOOLS } from "./tools.js";
import { mapErrorToMcp } from "./errors.js";
import { logger, errorCode } from "./observability/logger.js";

export function createMcpServer(
  service: ContactService,
  config: Pick<ServerConfig, "readOnly" | "maxBatch">
): Server {
  const handlers = createToolHandlers(service, { maxBatch: config.maxBatch });

  const server = new Server(
    {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = config.readOnly
      ? toolDefinitions.filter((t) => isToolName(t.name) && READ_ONLY_TOOLS.has(t.name))
      : toolDefinitions;

    return { tools };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      if (config.readOnly && !READ_ONLY_TOOLS.has(name)) {
        throw new McpError(
          ErrorCode.InvalidRequest,
          `Tool '${name}' not available in read-only mode`
        );
      }

      return await handlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(err),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
