/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a real store
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { openStore, sequentialIds, StoreClosedError } from "@contactbook/store";
import { ContactService } from "../../service/contacts.js";
import { createToolHandlers, isToolName, toolDefinitions, type ToolHandler, type ToolName } from "../../tools.js";
import { BatchLimitError } from "../../errors.js";
import { metrics } from "../../observability/metrics.js";

const ALICE = { name: "Alice Smith", phone: "555-010-0001", email: "alice@example.com" };
const BOB = { name: "Bob Jones", phone: "555-010-0002", email: "bob@example.com" };
const CHARLIE = { name: "Charlie Smith", phone: "555-010-0003", email: "charlie@example.com" };

function textOf(result: CallToolResult): string | undefined {
  const first = result.content[0];
  return first?.type === "text" ? first.text : undefined;
}

let service: ContactService;
let tools: Record<ToolName, ToolHandler>;

beforeEach(() => {
  metrics.reset();
  service = new ContactService(openStore({ idGenerator: sequentialIds("c") }));
  tools = createToolHandlers(service, { maxBatch: 3 });
});

describe("Tool integration tests", () => {
  describe("create_contacts and get_contact", () => {
    it("should create contacts and retrieve them", async () => {
      const created = await tools.create_contacts({ contacts: [ALICE, BOB] });

      expect(textOf(created)).toBe("Created 2 contacts");
      expect(created.structuredContent).toEqual({
        created: [
          { id: "c-00000001", ...ALICE },
          { id: "c-00000002", ...BOB },
        ],
        failed: [],
      });

      const fetched = await tools.get_contact({ id: "c-00000002" });
      expect(textOf(fetched)).toBe("Found contact c-00000002");
      expect(fetched.structuredContent).toEqual({ contact: { id: "c-00000002", ...BOB } });
    });

    it("should return null for a missing contact", async () => {
      const fetched = await tools.get_contact({ id: "ghost" });

      expect(textOf(fetched)).toBe("Contact ghost not found");
      expect(fetched.structuredContent).toEqual({ contact: null });
    });

    it("should report conflicting items without failing the call", async () => {
      const result = await tools.create_contacts({
        contacts: [ALICE, { ...BOB, email: "ALICE@example.com" }],
      });

      expect(textOf(result)).toBe("Created 1 contacts, 1 failed");
      expect(result.structuredContent).toEqual({
        created: [{ id: "c-00000001", ...ALICE }],
        failed: [
          {
            index: 1,
            code: "CONFLICT",
            message: 'email "ALICE@example.com" is already used by contact c-00000001',
          },
        ],
      });
      expect(metrics.getCounter("contactbook.records_total", { tool: "create_contacts", outcome: "ok" })).toBe(1);
      expect(metrics.getCounter("contactbook.records_total", { tool: "create_contacts", outcome: "failed" })).toBe(1);
    });

    it("should reject the whole batch when one item is malformed", async () => {
      await expect(
        tools.create_contacts({ contacts: [ALICE, { ...BOB, phone: "555-0102" }] })
      ).rejects.toThrow(ZodError);

      const listed = await tools.list_contacts({});
      expect(listed.structuredContent).toMatchObject({ total: 0 });
    });

    it("should enforce the batch limit", async () => {
      await expect(
        tools.create_contacts({
          contacts: [ALICE, BOB, CHARLIE, { name: "Dana Lee", phone: "555-010-0004", email: "dana@example.com" }],
        })
      ).rejects.toThrow(BatchLimitError);
    });
  });

  describe("update_contacts", () => {
    it("should update fields and report missing ids", async () => {
      await tools.create_contacts({ contacts: [ALICE] });

      const result = await tools.update_contacts({
        updates: [
          { id: "c-00000001", phone: "(555) 010-0042" },
          { id: "ghost", name: "Nobody" },
        ],
      });

      expect(textOf(result)).toBe("Updated 1 contacts, 1 failed");
      expect(result.structuredContent).toEqual({
        updated: [{ id: "c-00000001", ...ALICE, phone: "(555) 010-0042" }],
        failed: [{ index: 1, id: "ghost", code: "NOT_FOUND", message: "Contact not found: ghost" }],
      });
    });

    it("should reject updates carrying unknown fields", async () => {
      await expect(tools.update_contacts({ updates: [{ id: "c-00000001", nickname: "Al" }] })).rejects.toThrow(
        ZodError
      );
    });
  });

  describe("delete_contacts", () => {
    it("should be idempotent", async () => {
      await tools.create_contacts({ contacts: [ALICE, BOB] });

      const first = await tools.delete_contacts({ ids: ["c-00000001", "ghost"] });
      const second = await tools.delete_contacts({ ids: ["c-00000001"] });

      expect(textOf(first)).toBe("Deleted 1 contacts");
      expect(first.structuredContent).toEqual({ deleted: 1 });
      expect(second.structuredContent).toEqual({ deleted: 0 });
    });
  });

  describe("search_contacts", () => {
    beforeEach(async () => {
      await tools.create_contacts({ contacts: [ALICE, BOB, CHARLIE] });
    });

    it("should find contacts by name word", async () => {
      const result = await tools.search_contacts({ query: "smith" });

      expect(textOf(result)).toBe('Search for "smith" returned 2 contacts');
      expect(result.structuredContent).toEqual({
        results: [
          { id: "c-00000001", ...ALICE },
          { id: "c-00000003", ...CHARLIE },
        ],
        count: 2,
      });
    });

    it("should find a contact by a differently formatted phone", async () => {
      const result = await tools.search_contacts({ query: "(555) 010.0002" });
      expect(result.structuredContent).toMatchObject({ count: 1, results: [{ id: "c-00000002" }] });
    });

    it("should honor limit and mode", async () => {
      expect((await tools.search_contacts({ query: "smith", limit: 1 })).structuredContent).toMatchObject({
        count: 1,
        results: [{ id: "c-00000001" }],
      });
      expect((await tools.search_contacts({ query: "char" })).structuredContent).toEqual({ results: [], count: 0 });
      expect(
        (await tools.search_contacts({ query: "char", mode: "substring" })).structuredContent
      ).toMatchObject({ count: 1, results: [{ id: "c-00000003" }] });
    });

    it("should count calls per tool", async () => {
      await tools.search_contacts({ query: "smith" });
      await tools.search_contacts({ query: "jones" });

      expect(metrics.getCounter("contactbook.tool.calls_total", { tool: "search_contacts" })).toBe(2);
      expect(metrics.getHistogram("contactbook.tool.latency_ms", { tool: "search_contacts" })?.count).toBe(2);
    });
  });

  describe("list_contacts", () => {
    it("should page through contacts in id order", async () => {
      await tools.create_contacts({ contacts: [ALICE, BOB, CHARLIE] });

      const result = await tools.list_contacts({ limit: 2, skip: 1 });

      expect(textOf(result)).toBe("Listed 2 of 3 contacts");
      expect(result.structuredContent).toEqual({
        contacts: [
          { id: "c-00000002", ...BOB },
          { id: "c-00000003", ...CHARLIE },
        ],
        count: 2,
        total: 3,
      });
    });

    it("should accept a call without arguments", async () => {
      const result = await tools.list_contacts(undefined);
      expect(result.structuredContent).toEqual({ contacts: [], count: 0, total: 0 });
    });
  });

  describe("health", () => {
    it("should report a consistent store", async () => {
      await tools.create_contacts({ contacts: [ALICE] });

      const result = await tools.health(undefined);

      expect(textOf(result)).toBe("contactbook-server healthy");
      expect(result.structuredContent).toMatchObject({
        status: "healthy",
        records: 1,
        consistent: true,
        indexes: { records: 1, nameTokens: 2, phoneKeys: 1, emailKeys: 1 },
      });
    });
  });

  describe("call accounting", () => {
    it("should record a failed call with the store error code", async () => {
      service.close();

      await expect(tools.get_contact({ id: "c-00000001" })).rejects.toThrow(StoreClosedError);

      expect(metrics.getCounter("contactbook.tool.calls_total", { tool: "get_contact" })).toBe(1);
      expect(
        metrics.getCounter("contactbook.tool.errors_total", { tool: "get_contact", err_code: "STORE_CLOSED" })
      ).toBe(1);
    });

    it("should finish a large batch and record it as one successful call", async () => {
      const large = createToolHandlers(new ContactService(openStore()), { maxBatch: 2000 });
      const contacts = Array.from({ length: 2000 }, (_, i) => ({
        name: `Person ${i}`,
        phone: `555-${String(i).padStart(7, "0")}`,
        email: `person${i}@example.com`,
      }));

      const result = await large.create_contacts({ contacts });

      expect(textOf(result)).toBe("Created 2000 contacts");
      expect(metrics.getCounter("contactbook.tool.calls_total", { tool: "create_contacts" })).toBe(1);
      expect(metrics.getCounter("contactbook.records_total", { tool: "create_contacts", outcome: "ok" })).toBe(2000);
    });
  });

  describe("tool definitions", () => {
    it("should define a handler for every listed tool", () => {
      const names = toolDefinitions.map((tool) => tool.name);

      expect(names).toEqual([
        "create_contacts",
        "update_contacts",
        "delete_contacts",
        "search_contacts",
        "get_contact",
        "list_contacts",
        "health",
      ]);
      expect(names.every(isToolName)).toBe(true);
      expect(isToolName("put_doc")).toBe(false);
    });
  });
});
