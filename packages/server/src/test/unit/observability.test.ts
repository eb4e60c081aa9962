/**
 * Unit tests for server logging and metrics
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Logger, errorCode } from "../../observability/logger.js";
import {
  MetricsRegistry,
  metrics,
  recordToolExecution,
  recordBatchOutcome,
  recordSearchResults,
} from "../../observability/metrics.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write JSON lines to stderr", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.info("contacts.create", { created: 2 });

    expect(stderr).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: "info", event: "contacts.create", created: 2 });
    expect(typeof line.ts).toBe("string");
  });

  it("should drop events below the minimum level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.setLevel("error");
    logger.warn("d");
    logger.error("e");

    const events = stderr.mock.calls.map((call) => JSON.parse(String(call[0])).event);
    expect(events).toEqual(["c", "e"]);
  });

  it("should log a successful tool call at info", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    new Logger().toolCall("get_contact", 1.23456);

    expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({
      level: "info",
      event: "tool.success",
      tool: "get_contact",
      duration_ms: 1.23,
    });
  });

  it("should log a failed tool call with its error code", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const err = Object.assign(new Error("already used"), { code: "CONFLICT" });

    new Logger().toolCall("update_contacts", 12, err);

    expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({
      level: "error",
      event: "tool.error",
      tool: "update_contacts",
      duration_ms: 12,
      err_code: "CONFLICT",
      err_message: "already used",
    });
  });
});

describe("errorCode", () => {
  it("should read string and numeric codes", () => {
    expect(errorCode({ code: "CONFLICT" })).toBe("CONFLICT");
    expect(errorCode({ code: -32602 })).toBe("-32602");
  });

  it("should ignore values without a code", () => {
    expect(errorCode(new Error("x"))).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
    expect(errorCode({ code: { nested: true } })).toBeUndefined();
  });
});

describe("MetricsRegistry", () => {
  let registry: MetricsRegistry;

  beforeEach(() => {
    registry = new MetricsRegistry();
  });

  it("should key counters by name and labels regardless of label order", () => {
    registry.inc("contactbook.records_total", { tool: "create_contacts", outcome: "ok" });
    registry.inc("contactbook.records_total", { outcome: "ok", tool: "create_contacts" }, 2);

    expect(registry.getCounter("contactbook.records_total", { tool: "create_contacts", outcome: "ok" })).toBe(3);
    expect(registry.getCounter("contactbook.records_total", { tool: "create_contacts" })).toBe(0);
  });

  it("should summarize histograms", () => {
    for (let i = 1; i <= 100; i++) {
      registry.observe("contactbook.tool.latency_ms", i, { tool: "get_contact" });
    }

    expect(registry.getHistogram("contactbook.tool.latency_ms", { tool: "get_contact" })).toEqual({
      count: 100,
      sum: 5050,
      p50: 50,
      p95: 95,
      p99: 99,
    });
    expect(registry.getHistogram("contactbook.tool.latency_ms")).toBeNull();
  });

  it("should keep only the last 1000 samples", () => {
    registry.observe("contactbook.search.results", 500);
    for (let i = 0; i < 1000; i++) {
      registry.observe("contactbook.search.results", 1);
    }
    expect(registry.getHistogram("contactbook.search.results")).toMatchObject({ count: 1000, sum: 1000, p99: 1 });
  });

  it("should clear everything on reset", () => {
    registry.inc("contactbook.tool.calls_total", { tool: "health" });
    registry.observe("contactbook.tool.latency_ms", 3, { tool: "health" });

    registry.reset();

    expect(registry.getCounter("contactbook.tool.calls_total", { tool: "health" })).toBe(0);
    expect(registry.getHistogram("contactbook.tool.latency_ms", { tool: "health" })).toBeNull();
  });
});

describe("metric helpers", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should count calls, errors and latency per tool", () => {
    recordToolExecution("delete_contacts", 3, true);
    recordToolExecution("delete_contacts", 5, false, "BATCH_LIMIT");

    expect(metrics.getCounter("contactbook.tool.calls_total", { tool: "delete_contacts" })).toBe(2);
    expect(
      metrics.getCounter("contactbook.tool.errors_total", { tool: "delete_contacts", err_code: "BATCH_LIMIT" })
    ).toBe(1);
    expect(metrics.getHistogram("contactbook.tool.latency_ms", { tool: "delete_contacts" })?.sum).toBe(8);
  });

  it("should count per-record outcomes of bulk calls", () => {
    recordBatchOutcome("create_contacts", 4, 1);
    recordBatchOutcome("create_contacts", 0, 0);

    expect(metrics.getCounter("contactbook.records_total", { tool: "create_contacts", outcome: "ok" })).toBe(4);
    expect(metrics.getCounter("contactbook.records_total", { tool: "create_contacts", outcome: "failed" })).toBe(1);
  });

  it("should file search result sizes under the requested mode", () => {
    recordSearchResults("substring", 7);
    recordSearchResults(undefined, 2);

    expect(metrics.getHistogram("contactbook.search.results", { mode: "substring" })?.sum).toBe(7);
    expect(metrics.getHistogram("contactbook.search.results", { mode: "default" })?.sum).toBe(2);
  });
});
