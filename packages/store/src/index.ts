/**
 * Contact Store
 *
 * An in-memory contact table with name-token, phone and email indexes
 */

// Re-export types
export type {
  ContactRecord,
  ContactInput,
  ContactPatch,
  ContactField,
  UniqueField,
  SearchMode,
  SearchOptions,
  IdGenerator,
  StoreOptions,
  StoreStats,
  ConsistencyReport,
  ContactStore,
} from "./types.js";

// Re-export utilities
export { tokenize, normalizePhone, normalizeEmail } from "./tokens.js";
export { uuidIds, sequentialIds } from "./ids.js";
export { TokenIndex, UniqueIndex } from "./indexes.js";
export { ReadWriteLock } from "./lock.js";

// Re-export observability
export { Logger, logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogContext, StoreEvent } from "./observability/logs.js";
export { MetricsCollector } from "./observability/metrics.js";
export type {
  IndexName,
  OperationName,
  IndexMetrics,
  OperationMetrics,
} from "./observability/metrics.js";

// Re-export errors
export {
  ContactStoreError,
  InvalidInputError,
  ConflictError,
  NotFoundError,
  LockViolationError,
  IdCollisionError,
  StoreClosedError,
} from "./errors.js";

export { openStore } from "./store.js";
export type { IndexedStore } from "./store.js";
