/**
 * MCP tool implementations for the contact book
 * All tools return a text summary plus structured content
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  CreateContactsInputSchema,
  UpdateContactsInputSchema,
  DeleteContactsInputSchema,
  SearchContactsInputSchema,
  GetContactInputSchema,
  ListContactsInputSchema,
  HealthInputSchema,
} from "./schemas.js";
import type { ContactService } from "./service/contacts.js";
import { BatchLimitError } from "./errors.js";
import { logger, errorCode } from "./observability/logger.js";
import { recordToolExecution, recordBatchOutcome, recordSearchResults } from "./observability/metrics.js";

export type ToolName =
  | "create_contacts"
  | "update_contacts"
  | "delete_contacts"
  | "search_contacts"
  | "get_contact"
  | "list_contacts"
  | "health";

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

export interface ToolOptions {
  /** Maximum items per bulk call */
  maxBatch: number;
}

/**
 * Tools available in read-only mode
 */
export const READ_ONLY_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
  "get_contact",
  "search_contacts",
  "list_contacts",
  "health",
]);

/**
 * Run a tool body with timing, logging and metrics
 * Store calls are synchronous, so the body finishes within this call
 */
function executeTool<T>(toolName: ToolName, handler: () => T): T {
  const startTime = performance.now();
  let error: Error | undefined;

  try {
    return handler();
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    const duration = performance.now() - startTime;
    logger.toolCall(toolName, duration, error);
    recordToolExecution(toolName, duration, error === undefined, errorCode(error));
  }
}

function toolResult(text: string, data: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text }],
    structuredContent: data,
  };
}

function assertBatch(items: number, limit: number): void {
  if (items > limit) {
    throw new BatchLimitError(items, limit);
  }
}

/**
 * Build the tool handlers over an explicitly owned service
 */
export function createToolHandlers(
  service: ContactService,
  options: ToolOptions
): Record<ToolName, ToolHandler> {
  const { maxBatch } = options;

  return {
    /**
     * create_contacts: Create one or more contacts
     */
    create_contacts: async (args) => {
      const { contacts } = CreateContactsInputSchema.parse(args);
      assertBatch(contacts.length, maxBatch);

      return executeTool("create_contacts", () => {
        const { created, failed } = service.createContacts(contacts);
        recordBatchOutcome("create_contacts", created.length, failed.length);

        const summary = failed.length
          ? `Created ${created.length} contacts, ${failed.length} failed`
          : `Created ${created.length} contacts`;
        return toolResult(summary, { created, failed });
      });
    },

    /**
     * update_contacts: Update fields of one or more contacts
     */
    update_contacts: async (args) => {
      const { updates } = UpdateContactsInputSchema.parse(args);
      assertBatch(updates.length, maxBatch);

      return executeTool("update_contacts", () => {
        const { updated, failed } = service.updateContacts(updates);
        recordBatchOutcome("update_contacts", updated.length, failed.length);

        const summary = failed.length
          ? `Updated ${updated.length} contacts, ${failed.length} failed`
          : `Updated ${updated.length} contacts`;
        return toolResult(summary, { updated, failed });
      });
    },

    /**
     * delete_contacts: Delete contacts by id (idempotent)
     */
    delete_contacts: async (args) => {
      const { ids } = DeleteContactsInputSchema.parse(args);
      assertBatch(ids.length, maxBatch);

      return executeTool("delete_contacts", () => {
        const deleted = service.deleteContacts(ids);
        return toolResult(`Deleted ${deleted} contacts`, { deleted });
      });
    },

    /**
     * search_contacts: Search by name word, phone or email
     */
    search_contacts: async (args) => {
      const { query, limit, mode } = SearchContactsInputSchema.parse(args);

      return executeTool("search_contacts", () => {
        const results = service.searchContacts(query, { limit, mode });
        recordSearchResults(mode, results.length);
        return toolResult(`Search for "${query}" returned ${results.length} contacts`, {
          results,
          count: results.length,
        });
      });
    },

    /**
     * get_contact: Retrieve a contact by id
     */
    get_contact: async (args) => {
      const { id } = GetContactInputSchema.parse(args);

      return executeTool("get_contact", () => {
        const contact = service.getContact(id);
        return toolResult(contact ? `Found contact ${id}` : `Contact ${id} not found`, { contact });
      });
    },

    /**
     * list_contacts: Page through all contacts in id order
     */
    list_contacts: async (args) => {
      const { limit, skip } = ListContactsInputSchema.parse(args);

      return executeTool("list_contacts", () => {
        const { contacts, total } = service.listContacts(limit, skip);
        return toolResult(`Listed ${contacts.length} of ${total} contacts`, {
          contacts,
          count: contacts.length,
          total,
        });
      });
    },

    /**
     * health: Service status and index sizes
     */
    health: async (args) => {
      HealthInputSchema.parse(args);

      return executeTool("health", () => {
        const report = service.health();
        return toolResult(`${report.service} ${report.status}`, { ...report });
      });
    },
  };
}

const contactProperties = {
  name: {
    type: "string",
    description: "Full name",
  },
  phone: {
    type: "string",
    description: "Phone number with at least 10 digits (spaces, dashes, dots, parentheses allowed)",
  },
  email: {
    type: "string",
    description: "Email address",
  },
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "create_contacts",
    description:
      "Create one or more contacts. Each contact is created independently; phone or email conflicts are reported per item",
    inputSchema: {
      type: "object",
      properties: {
        contacts: {
          type: "array",
          description: "Contacts to create",
          items: {
            type: "object",
            properties: contactProperties,
            required: ["name", "phone", "email"],
          },
        },
      },
      required: ["contacts"],
    },
  },
  {
    name: "update_contacts",
    description: "Update one or more contacts; fields left out keep their value",
    inputSchema: {
      type: "object",
      properties: {
        updates: {
          type: "array",
          description: "Updates, each with the contact id and the fields to change",
          items: {
            type: "object",
            properties: {
              id: {
                type: "string",
                description: "Contact ID",
              },
              ...contactProperties,
            },
            required: ["id"],
          },
        },
      },
      required: ["updates"],
    },
  },
  {
    name: "delete_contacts",
    description: "Delete contacts by ID (idempotent - unknown IDs are skipped)",
    inputSchema: {
      type: "object",
      properties: {
        ids: {
          type: "array",
          description: "Contact IDs",
          items: { type: "string" },
        },
      },
      required: ["ids"],
    },
  },
  {
    name: "search_contacts",
    description:
      "Search contacts by name word, exact phone or exact email (mode 'substring' also matches partial values)",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Free-text query",
        },
        limit: {
          type: "number",
          description: "Maximum number of results (max 1000, default 100)",
        },
        mode: {
          type: "string",
          enum: ["token", "substring"],
          description: "Search mode (defaults to the server's configured mode)",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "get_contact",
    description: "Retrieve a contact by ID",
    inputSchema: {
      type: "object",
      properties: {
        id: {
          type: "string",
          description: "Contact ID",
        },
      },
      required: ["id"],
    },
  },
  {
    name: "list_contacts",
    description: "List contacts in ID order (limit max 1000, default 100)",
    inputSchema: {
      type: "object",
      properties: {
        limit: {
          type: "number",
          description: "Maximum number of results (max 1000, default 100)",
        },
        skip: {
          type: "number",
          description: "Number of results to skip (for pagination, max 10000)",
        },
      },
    },
  },
  {
    name: "health",
    description: "Report service status, record count and index consistency",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

export function isToolName(name: string): name is ToolName {
  return toolDefinitions.some((tool) => tool.name === name);
}
