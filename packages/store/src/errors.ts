/**
 * Error types for contact store operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Every error is raised before the store mutates anything
 */

import type { ContactField, UniqueField } from "./types.js";

/**
 * Base class for all contact store errors
 */
export abstract class ContactStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a field is missing, blank or not a string
 */
export class InvalidInputError extends ContactStoreError {
  readonly code = "INVALID_INPUT";

  constructor(
    public readonly field: ContactField,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${field}: ${reason}`, options);
  }
}

/**
 * Thrown when a phone or email is already owned by another live record
 */
export class ConflictError extends ContactStoreError {
  readonly code = "CONFLICT";

  constructor(
    public readonly field: UniqueField,
    public readonly value: string,
    public readonly ownerId: string,
    options?: ErrorOptions
  ) {
    super(`${field} "${value}" is already used by contact ${ownerId}`, options);
  }
}

/**
 * Thrown when an operation references an id with no live record
 */
export class NotFoundError extends ContactStoreError {
  readonly code = "NOT_FOUND";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Contact not found: ${id}`, options);
  }
}

/**
 * Thrown when a section is entered while an incompatible one is held
 */
export class LockViolationError extends ContactStoreError {
  readonly code = "LOCK_VIOLATION";

  constructor(
    public readonly requested: "read" | "write",
    public readonly held: "read" | "write",
    options?: ErrorOptions
  ) {
    super(`Cannot enter ${requested} section while a ${held} section is held`, options);
  }
}

/**
 * Thrown when the id generator keeps returning ids that were already issued
 */
export class IdCollisionError extends ContactStoreError {
  readonly code = "ID_COLLISION";

  constructor(
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(`Failed to generate a unique contact id after ${attempts} attempts`, options);
  }
}

/**
 * Thrown when the store is used after close()
 */
export class StoreClosedError extends ContactStoreError {
  readonly code = "STORE_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Contact store is closed", options);
  }
}
