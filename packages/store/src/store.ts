/**
 * Main store implementation
 */

import type {
  ContactStore,
  ContactRecord,
  ContactInput,
  ContactPatch,
  ContactField,
  UniqueField,
  SearchOptions,
  StoreOptions,
  StoreStats,
  ConsistencyReport,
} from "./types.js";
import { TokenIndex, UniqueIndex } from "./indexes.js";
import { ReadWriteLock } from "./lock.js";
import { tokenize, normalizePhone, normalizeEmail } from "./tokens.js";
import { uuidIds } from "./ids.js";
import {
  InvalidInputError,
  ConflictError,
  NotFoundError,
  IdCollisionError,
  StoreClosedError,
} from "./errors.js";
import { MetricsCollector, type OperationName } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Read a required text field, rejecting non-strings and blank values
 */
function readText(value: unknown, field: ContactField): string {
  if (typeof value !== "string") {
    throw new InvalidInputError(field, "must be a string");
  }
  if (value.trim() === "") {
    throw new InvalidInputError(field, "must not be blank");
  }
  return value;
}

/**
 * Index keys derived from a record's current fields
 */
interface IndexKeys {
  tokens: string[];
  phone: string;
  email: string;
}

function keysOf(record: Pick<ContactRecord, "name" | "phone" | "email">): IndexKeys {
  return {
    tokens: tokenize(record.name),
    phone: normalizePhone(record.phone),
    email: normalizeEmail(record.email),
  };
}

function byId(a: ContactRecord, b: ContactRecord): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * A contact store together with its resolved options and metrics
 */
export interface IndexedStore extends ContactStore {
  readonly options: Required<StoreOptions>;
  readonly metrics: MetricsCollector;
}

/**
 * In-memory contact store with a primary table and three secondary indexes
 *
 * The primary table, the name-token index and the phone and email unique
 * indexes form one unit of shared state. Every mutation validates all of its
 * constraints first, then updates the four structures inside a single write
 * section, so a reader never sees an index that disagrees with the table.
 *
 * @example
 * ```typescript
 * const store = openStore();
 *
 * const alice = store.create({ name: "Alice Smith", phone: "555-010-2030", email: "alice@example.com" });
 * store.update(alice.id, { phone: "555-010-9999" });
 *
 * store.search("smith"); // [alice]
 * store.delete([alice.id]); // 1
 * ```
 */
class IndexedContactStore implements IndexedStore {
  #options: Required<StoreOptions>;
  #records = new Map<string, ContactRecord>();
  // Every id ever handed out, live or deleted
  #issued = new Set<string>();
  #names = new TokenIndex();
  #phones = new UniqueIndex();
  #emails = new UniqueIndex();
  #lock = new ReadWriteLock();
  #metrics = new MetricsCollector();
  #closed = false;

  constructor(options: StoreOptions = {}) {
    this.#options = {
      searchMode: options.searchMode ?? "token",
      idGenerator: options.idGenerator ?? uuidIds,
      maxIdAttempts: Math.max(1, options.maxIdAttempts ?? 3),
    };

    logger.debug("store.open", { details: { searchMode: this.#options.searchMode } });
  }

  get options(): Required<StoreOptions> {
    return this.#options;
  }

  get metrics(): MetricsCollector {
    return this.#metrics;
  }

  /**
   * Create a contact and file it in every index
   *
   * @throws {InvalidInputError} If name, phone or email is missing or blank
   * @throws {ConflictError} If the normalized phone or email is already owned
   * @throws {IdCollisionError} If the id generator keeps returning ids already issued
   */
  create(input: ContactInput): ContactRecord {
    return this.#measure("create", () =>
      this.#lock.write(() => {
        this.#assertOpen();

        const fields = {
          name: readText(input.name, "name"),
          phone: readText(input.phone, "phone"),
          email: readText(input.email, "email"),
        };
        const keys = keysOf(fields);
        this.#assertKeys(keys);
        this.#assertAvailable("phone", keys.phone, fields.phone);
        this.#assertAvailable("email", keys.email, fields.email);

        const record: ContactRecord = Object.freeze({ id: this.#nextId(), ...fields });
        this.#records.set(record.id, record);
        this.#names.add(record.id, keys.tokens);
        this.#phones.set(keys.phone, record.id);
        this.#emails.set(keys.email, record.id);

        logger.debug("contact.create", { contactId: record.id });
        return record;
      })
    );
  }

  /**
   * Look up a contact by id
   *
   * @throws {NotFoundError} If no live record has this id
   */
  get(id: string): ContactRecord {
    return this.#measure("get", () =>
      this.#lock.read(() => {
        this.#assertOpen();

        const record = this.#records.get(id);
        if (!record) {
          throw new NotFoundError(id);
        }
        return record;
      })
    );
  }

  has(id: string): boolean {
    return this.#lock.read(() => {
      this.#assertOpen();
      return this.#records.has(id);
    });
  }

  /**
   * Replace the supplied fields of a contact
   *
   * All constraints are checked before any structure changes. Only the
   * index entries whose keys actually change are touched.
   *
   * @throws {NotFoundError} If no live record has this id
   * @throws {InvalidInputError} If a supplied field is blank
   * @throws {ConflictError} If the new phone or email is owned by another record
   */
  update(id: string, patch: ContactPatch): ContactRecord {
    return this.#measure("update", () =>
      this.#lock.write(() => {
        this.#assertOpen();

        const current = this.#records.get(id);
        if (!current) {
          throw new NotFoundError(id);
        }

        const fields = {
          name: patch.name === undefined ? current.name : readText(patch.name, "name"),
          phone: patch.phone === undefined ? current.phone : readText(patch.phone, "phone"),
          email: patch.email === undefined ? current.email : readText(patch.email, "email"),
        };

        if (
          fields.name === current.name &&
          fields.phone === current.phone &&
          fields.email === current.email
        ) {
          return current;
        }

        const before = keysOf(current);
        const after = keysOf(fields);
        this.#assertKeys(after);
        this.#assertAvailable("phone", after.phone, fields.phone, id);
        this.#assertAvailable("email", after.email, fields.email, id);

        // Index deltas
        const kept = new Set(after.tokens);
        this.#names.remove(
          id,
          before.tokens.filter((token) => !kept.has(token))
        );
        this.#names.add(id, after.tokens);

        if (before.phone !== after.phone) {
          this.#phones.release(before.phone, id);
          this.#phones.set(after.phone, id);
        }
        if (before.email !== after.email) {
          this.#emails.release(before.email, id);
          this.#emails.set(after.email, id);
        }

        const record: ContactRecord = Object.freeze({ id, ...fields });
        this.#records.set(id, record);

        logger.debug("contact.update", {
          contactId: id,
          details: { fields: Object.keys(patch) },
        });
        return record;
      })
    );
  }

  /**
   * Remove contacts and every index entry pointing at them
   *
   * Duplicate ids are ignored and unknown ids are skipped.
   *
   * @returns Number of records actually removed
   */
  delete(ids: Iterable<string>): number {
    return this.#measure("delete", () =>
      this.#lock.write(() => {
        this.#assertOpen();

        let removed = 0;
        for (const id of new Set(ids)) {
          const record = this.#records.get(id);
          if (!record) continue;

          const keys = keysOf(record);
          this.#names.remove(id, keys.tokens);
          this.#phones.release(keys.phone, id);
          this.#emails.release(keys.email, id);
          this.#records.delete(id);
          removed++;
        }

        logger.debug("contact.delete", { details: { removed } });
        return removed;
      })
    );
  }

  /**
   * Find contacts matching a free-text query
   *
   * Every query token probes the name index, and the whole query probes the
   * phone and email indexes. In "substring" mode the primary table is also
   * scanned, which is O(n) in the number of records.
   *
   * @returns Matching records sorted by id; empty for a blank query
   */
  search(query: string, options: SearchOptions = {}): ContactRecord[] {
    return this.#measure("search", () =>
      this.#lock.read(() => {
        this.#assertOpen();

        const text = typeof query === "string" ? query.trim() : "";
        if (text === "") {
          this.#metrics.recordScan(0);
          return [];
        }

        const matched = new Set<string>();

        for (const token of tokenize(text)) {
          const bucket = this.#names.lookup(token);
          if (bucket) {
            this.#metrics.recordHit("name");
            for (const id of bucket) {
              matched.add(id);
            }
          } else {
            this.#metrics.recordMiss("name");
          }
        }

        const phoneKey = normalizePhone(text);
        const phoneOwner = phoneKey === "" ? undefined : this.#phones.lookup(phoneKey);
        if (phoneOwner !== undefined) {
          this.#metrics.recordHit("phone");
          matched.add(phoneOwner);
        } else {
          this.#metrics.recordMiss("phone");
        }

        const emailOwner = this.#emails.lookup(normalizeEmail(text));
        if (emailOwner !== undefined) {
          this.#metrics.recordHit("email");
          matched.add(emailOwner);
        } else {
          this.#metrics.recordMiss("email");
        }

        let scanned = 0;
        if ((options.mode ?? this.#options.searchMode) === "substring") {
          const needle = text.toLowerCase();
          for (const record of this.#records.values()) {
            scanned++;
            if (
              record.name.toLowerCase().includes(needle) ||
              (phoneKey !== "" && normalizePhone(record.phone).includes(phoneKey)) ||
              normalizeEmail(record.email).includes(needle)
            ) {
              matched.add(record.id);
            }
          }
        }
        this.#metrics.recordScan(scanned);

        const results: ContactRecord[] = [];
        for (const id of matched) {
          const record = this.#records.get(id);
          if (record) {
            results.push(record);
          }
        }
        results.sort(byId);

        return options.limit === undefined
          ? results
          : results.slice(0, Math.max(0, Math.floor(options.limit)));
      })
    );
  }

  list(): ContactRecord[] {
    return this.#measure("list", () =>
      this.#lock.read(() => {
        this.#assertOpen();
        return [...this.#records.values()].sort(byId);
      })
    );
  }

  stats(): StoreStats {
    return this.#lock.read(() => {
      this.#assertOpen();
      return {
        records: this.#records.size,
        nameTokens: this.#names.size,
        phoneKeys: this.#phones.size,
        emailKeys: this.#emails.size,
      };
    });
  }

  /**
   * Rebuild the expected index entries from the primary table and report
   * every divergence in both directions
   */
  verify(): ConsistencyReport {
    return this.#measure("verify", () =>
      this.#lock.read(() => {
        this.#assertOpen();

        const problems: string[] = [];

        for (const [id, record] of this.#records) {
          if (record.id !== id) {
            problems.push(`primary key ${id} holds contact ${record.id}`);
          }

          const keys = keysOf(record);
          for (const token of keys.tokens) {
            if (!this.#names.lookup(token)?.has(id)) {
              problems.push(`name token "${token}" is missing contact ${id}`);
            }
          }
          if (this.#phones.lookup(keys.phone) !== id) {
            problems.push(`phone "${keys.phone}" does not point at contact ${id}`);
          }
          if (this.#emails.lookup(keys.email) !== id) {
            problems.push(`email "${keys.email}" does not point at contact ${id}`);
          }
        }

        for (const [token, ids] of this.#names.entries()) {
          if (ids.size === 0) {
            problems.push(`name token "${token}" has an empty bucket`);
          }
          for (const id of ids) {
            const record = this.#records.get(id);
            if (!record) {
              problems.push(`name token "${token}" references missing contact ${id}`);
            } else if (!tokenize(record.name).includes(token)) {
              problems.push(`name token "${token}" holds stale contact ${id}`);
            }
          }
        }

        for (const [key, id] of this.#phones.entries()) {
          const record = this.#records.get(id);
          if (!record || normalizePhone(record.phone) !== key) {
            problems.push(`phone "${key}" holds stale contact ${id}`);
          }
        }

        for (const [key, id] of this.#emails.entries()) {
          const record = this.#records.get(id);
          if (!record || normalizeEmail(record.email) !== key) {
            problems.push(`email "${key}" holds stale contact ${id}`);
          }
        }

        if (problems.length > 0) {
          logger.warn("store.verify.failed", { details: { problems: problems.length } });
        }

        return { ok: problems.length === 0, problems };
      })
    );
  }

  /**
   * Drop every record and index entry
   *
   * Idempotent. Any later operation throws StoreClosedError.
   */
  close(): void {
    this.#lock.write(() => {
      if (this.#closed) return;

      const records = this.#records.size;
      this.#records.clear();
      this.#names.clear();
      this.#phones.clear();
      this.#emails.clear();
      this.#closed = true;

      logger.debug("store.close", { details: { records } });
    });
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError();
    }
  }

  /**
   * Reject values whose normalized key is empty, e.g. a phone made only of separators
   */
  #assertKeys(keys: IndexKeys): void {
    if (keys.phone === "") {
      throw new InvalidInputError("phone", "must contain more than separators");
    }
  }

  /**
   * Fail if key is owned by a record other than self
   */
  #assertAvailable(field: UniqueField, key: string, value: string, self?: string): void {
    const index = field === "phone" ? this.#phones : this.#emails;
    const owner = self === undefined ? index.lookup(key) : index.ownerOtherThan(key, self);
    if (owner !== undefined) {
      throw new ConflictError(field, value, owner);
    }
  }

  /**
   * Draw an id that this store has never issued, so ids of deleted records stay retired
   */
  #nextId(): string {
    for (let attempt = 1; attempt <= this.#options.maxIdAttempts; attempt++) {
      const id = this.#options.idGenerator();
      if (id !== "" && !this.#issued.has(id)) {
        this.#issued.add(id);
        return id;
      }
      logger.warn("store.id.collision", { details: { id, attempt } });
    }
    throw new IdCollisionError(this.#options.maxIdAttempts);
  }

  #measure<T>(op: OperationName, fn: () => T): T {
    const startTime = performance.now();
    let ok = false;
    try {
      const result = fn();
      ok = true;
      return result;
    } finally {
      this.#metrics.recordOperation(op, performance.now() - startTime, ok);
    }
  }
}

/**
 * Open a new, empty contact store
 *
 * Each call returns an independent store; the caller owns it and should
 * close() it on shutdown.
 */
export function openStore(options: StoreOptions = {}): IndexedStore {
  return new IndexedContactStore(options);
}
