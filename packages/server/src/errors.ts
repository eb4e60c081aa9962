/**
 * Tool error types and mapping to MCP error codes
 */

import { z } from "zod";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import {
  InvalidInputError,
  NotFoundError,
  ConflictError,
} from "@contactbook/store";

/**
 * Thrown when a bulk call carries more items than the configured limit
 */
export class BatchLimitError extends Error {
  readonly code = "BATCH_LIMIT";

  constructor(
    public readonly items: number,
    public readonly limit: number
  ) {
    super(`Batch of ${items} items exceeds limit of ${limit}`);
    this.name = "BatchLimitError";
  }
}

/**
 * Map tool errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    // Zod validation errors -> Invalid params
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    };
  }

  if (error instanceof BatchLimitError || error instanceof InvalidInputError) {
    return {
      code: ErrorCode.InvalidParams,
      message: error.message,
    };
  }

  if (error instanceof NotFoundError || error instanceof ConflictError) {
    return {
      code: ErrorCode.InvalidRequest,
      message: error.message,
    };
  }

  if (error instanceof Error) {
    return {
      code: ErrorCode.InternalError,
      message: error.message,
    };
  }

  // Unknown error type
  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}
