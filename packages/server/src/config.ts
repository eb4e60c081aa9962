/**
 * Server configuration resolved from the environment
 *
 * Parsed once at startup; invalid values fail fast with the variable name.
 */

import { z } from "zod";
import type { SearchMode } from "@contactbook/store";
import type { LogLevel } from "./observability/logger.js";

export interface ServerConfig {
  /** CONTACTBOOK_ENABLED: when false the server exits immediately */
  enabled: boolean;
  /** CONTACTBOOK_READONLY: expose only read tools */
  readOnly: boolean;
  /** CONTACTBOOK_SEARCH_MODE: default store search mode */
  searchMode: SearchMode;
  /** CONTACTBOOK_MAX_BATCH: maximum items per bulk tool call */
  maxBatch: number;
  /** LOG_LEVEL: minimum server log level */
  logLevel: LogLevel;
}

/**
 * Thrown when an environment variable holds an invalid value
 */
export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    reason: string
  ) {
    super(`Invalid ${variable}: ${reason}`);
    this.name = "ConfigError";
  }
}

const Flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const EnvSchema = z.object({
  CONTACTBOOK_ENABLED: Flag(true),
  CONTACTBOOK_READONLY: Flag(false),
  CONTACTBOOK_SEARCH_MODE: z.enum(["token", "substring"]).default("token"),
  CONTACTBOOK_MAX_BATCH: z.coerce.number().int().min(1).max(10000).default(1000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * Resolve the server configuration
 * Empty variables count as unset
 *
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? "environment"), issue?.message ?? "invalid value");
  }

  const parsed = result.data;
  return {
    enabled: parsed.CONTACTBOOK_ENABLED,
    readOnly: parsed.CONTACTBOOK_READONLY,
    searchMode: parsed.CONTACTBOOK_SEARCH_MODE,
    maxBatch: parsed.CONTACTBOOK_MAX_BATCH,
    logLevel: parsed.LOG_LEVEL,
  };
}
