/**
 * Contact service
 * Fans bulk requests out to the store's single-record primitives and
 * aggregates per-item outcomes
 */

import {
  InvalidInputError,
  ConflictError,
  NotFoundError,
  type ContactStore,
  type ContactRecord,
  type ContactInput,
  type ContactPatch,
  type SearchOptions,
  type StoreStats,
} from "@contactbook/store";
import { logger } from "../observability/logger.js";

export const SERVICE_NAME = "contactbook-server";
export const SERVICE_VERSION = "0.1.0";

export interface ContactUpdate extends ContactPatch {
  id: string;
}

/**
 * A record the store refused, reported next to the successes
 */
export interface ItemFailure {
  /** Position of the item in the request */
  index: number;
  /** Contact id, for updates */
  id?: string;
  /** Store error code (CONFLICT, NOT_FOUND, INVALID_INPUT) */
  code: string;
  message: string;
}

export interface CreateResult {
  created: ContactRecord[];
  failed: ItemFailure[];
}

export interface UpdateResult {
  updated: ContactRecord[];
  failed: ItemFailure[];
}

export interface ContactPage {
  contacts: ContactRecord[];
  total: number;
}

export interface HealthReport {
  status: "healthy" | "degraded";
  service: string;
  version: string;
  records: number;
  indexes: StoreStats;
  consistent: boolean;
}

/**
 * Store errors that concern one item of a batch rather than the whole call
 */
function isItemError(err: unknown): err is InvalidInputError | ConflictError | NotFoundError {
  return (
    err instanceof InvalidInputError || err instanceof ConflictError || err instanceof NotFoundError
  );
}

/**
 * Warn with the failure count per error code, e.g. { CONFLICT: 2, NOT_FOUND: 1 }
 */
function logFailures(event: string, failed: ItemFailure[]): void {
  if (failed.length === 0) return;

  const codes: Record<string, number> = {};
  for (const { code } of failed) {
    codes[code] = (codes[code] ?? 0) + 1;
  }
  logger.warn(event, { codes });
}

export class ContactService {
  #store: ContactStore;

  constructor(store: ContactStore) {
    this.#store = store;
    logger.info("service.init", {});
  }

  /**
   * Create each contact independently
   * A conflicting item is reported in `failed` and does not stop the others
   */
  createContacts(inputs: ContactInput[]): CreateResult {
    const created: ContactRecord[] = [];
    const failed: ItemFailure[] = [];

    inputs.forEach((input, index) => {
      try {
        created.push(this.#store.create(input));
      } catch (err) {
        if (!isItemError(err)) throw err;
        failed.push({ index, code: err.code, message: err.message });
      }
    });

    logger.info("contacts.create", { created: created.length, failed: failed.length });
    logFailures("contacts.create.failed", failed);
    return { created, failed };
  }

  /**
   * Apply each update independently
   */
  updateContacts(updates: ContactUpdate[]): UpdateResult {
    const updated: ContactRecord[] = [];
    const failed: ItemFailure[] = [];

    updates.forEach(({ id, ...patch }, index) => {
      try {
        updated.push(this.#store.update(id, patch));
      } catch (err) {
        if (!isItemError(err)) throw err;
        failed.push({ index, id, code: err.code, message: err.message });
      }
    });

    logger.info("contacts.update", { updated: updated.length, failed: failed.length });
    logFailures("contacts.update.failed", failed);
    return { updated, failed };
  }

  /**
   * Delete contacts; ids that are already gone are not an error
   * @returns Number of contacts removed
   */
  deleteContacts(ids: string[]): number {
    const deleted = this.#store.delete(ids);
    logger.info("contacts.delete", { requested: ids.length, deleted });
    return deleted;
  }

  searchContacts(query: string, options?: SearchOptions): ContactRecord[] {
    const results = this.#store.search(query, options);
    logger.info("contacts.search", { query, results: results.length });
    return results;
  }

  /**
   * Get a contact by id
   * Returns null if not found (not an error)
   */
  getContact(id: string): ContactRecord | null {
    const found = this.#store.has(id);
    logger.debug("contacts.get", { id, found });
    return found ? this.#store.get(id) : null;
  }

  /**
   * Page through all contacts in id order
   */
  listContacts(limit: number, skip: number): ContactPage {
    const all = this.#store.list();
    logger.debug("contacts.list", { limit, skip, total: all.length });
    return { contacts: all.slice(skip, skip + limit), total: all.length };
  }

  health(): HealthReport {
    const indexes = this.#store.stats();
    const { ok } = this.#store.verify();
    return {
      status: ok ? "healthy" : "degraded",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      records: indexes.records,
      indexes,
      consistent: ok,
    };
  }

  close(): void {
    this.#store.close();
    logger.info("service.close", {});
  }
}
