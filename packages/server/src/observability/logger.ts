/**
 * JSON-lines logging on stderr
 * stdout carries MCP frames, so every line goes through console.error
 */

import type { ToolName } from "../tools.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Read a `code` property from an error-like value
 * Store errors carry string codes, McpError numeric ones
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    if (typeof code === "string" || typeof code === "number") {
      return String(code);
    }
  }
  return undefined;
}

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  debug(event: string, fields?: LogFields): void {
    this.#write("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.#write("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.#write("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.#write("error", event, fields);
  }

  /**
   * One line per tool call; a failed call carries the same error code the metrics use
   */
  toolCall(tool: ToolName, durationMs: number, error?: Error): void {
    const duration_ms = Number(durationMs.toFixed(2));
    if (error === undefined) {
      this.info("tool.success", { tool, duration_ms });
      return;
    }
    this.error("tool.error", {
      tool,
      duration_ms,
      err_code: errorCode(error) ?? "UNKNOWN",
      err_message: error.message,
    });
  }

  #write(level: LogLevel, event: string, fields?: LogFields): void {
    if (SEVERITY[level] < SEVERITY[this.#minLevel]) {
      return;
    }
    console.error(JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }));
  }
}

// main() applies LOG_LEVEL from the validated config
export const logger = new Logger();
