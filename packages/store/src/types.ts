/**
 * Core types for the contact store
 */

/**
 * A contact as held by the store
 *
 * Records handed out by the store are frozen; an update installs a new record.
 */
export interface ContactRecord {
  /** Store-generated identifier, immutable */
  readonly id: string;
  /** Display name, tokenized into the name index */
  readonly name: string;
  /** Phone number as supplied; its normalized form is the uniqueness key */
  readonly phone: string;
  /** Email address as supplied; its lowercased form is the uniqueness key */
  readonly email: string;
}

/**
 * Fields required to create a contact
 */
export interface ContactInput {
  name: string;
  phone: string;
  email: string;
}

/**
 * Fields that may change on update
 */
export type ContactPatch = Partial<ContactInput>;

/**
 * Field names that carry a uniqueness constraint
 */
export type UniqueField = "phone" | "email";

/**
 * Contact field names
 */
export type ContactField = keyof ContactInput;

/**
 * Search strategy
 *
 * - "token": name-token lookups plus exact phone/email probes, O(t + k)
 * - "substring": additionally scans every record for substring containment, O(n)
 */
export type SearchMode = "token" | "substring";

/**
 * Per-call search options
 */
export interface SearchOptions {
  /** Override the store's default search mode */
  mode?: SearchMode;
  /** Maximum number of records to return (after sorting by id) */
  limit?: number;
}

/**
 * Generates record identifiers
 */
export type IdGenerator = () => string;

/**
 * Options for opening a store
 */
export interface StoreOptions {
  /** Default search mode (default: "token") */
  searchMode?: SearchMode;
  /** Identifier generator (default: crypto.randomUUID) */
  idGenerator?: IdGenerator;
  /** Attempts before giving up when the generator returns an id already issued (default: 3) */
  maxIdAttempts?: number;
}

/**
 * Sizes of the store's structures
 */
export interface StoreStats {
  /** Live records in the primary table */
  records: number;
  /** Distinct tokens in the name index */
  nameTokens: number;
  /** Keys in the phone index */
  phoneKeys: number;
  /** Keys in the email index */
  emailKeys: number;
}

/**
 * Result of checking the indexes against the primary table
 */
export interface ConsistencyReport {
  /** True if no divergence was found */
  ok: boolean;
  /** One human-readable line per divergence */
  problems: string[];
}

/**
 * The indexed contact store contract
 */
export interface ContactStore {
  /**
   * Create a contact and index it
   * @throws {InvalidInputError} If a field is missing or blank
   * @throws {ConflictError} If the phone or email belongs to another live record
   */
  create(input: ContactInput): ContactRecord;

  /**
   * Look up a contact by id
   * @throws {NotFoundError} If no live record has this id
   */
  get(id: string): ContactRecord;

  /**
   * Check whether a live record has this id
   */
  has(id: string): boolean;

  /**
   * Replace some fields of a contact, keeping the others
   * @throws {NotFoundError} If no live record has this id
   * @throws {InvalidInputError} If a supplied field is blank
   * @throws {ConflictError} If the new phone or email belongs to another live record
   */
  update(id: string, patch: ContactPatch): ContactRecord;

  /**
   * Remove contacts; unknown ids are skipped
   * @returns Number of records actually removed
   */
  delete(ids: Iterable<string>): number;

  /**
   * Find contacts matching a free-text query, sorted by id
   */
  search(query: string, options?: SearchOptions): ContactRecord[];

  /**
   * All live contacts, sorted by id
   */
  list(): ContactRecord[];

  /**
   * Structure sizes
   */
  stats(): StoreStats;

  /**
   * Rebuild the expected indexes from the primary table and compare
   */
  verify(): ConsistencyReport;

  /**
   * Drop all records; later calls throw StoreClosedError
   */
  close(): void;
}
