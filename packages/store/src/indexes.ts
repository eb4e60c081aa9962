/**
 * Secondary index structures
 *
 * Invariants:
 * - TokenIndex never keeps an empty bucket
 * - UniqueIndex maps each key to exactly one id
 * - Neither structure validates ids; the store decides what gets filed
 */

/**
 * Inverted index: token → set of record ids
 */
export class TokenIndex {
  #buckets = new Map<string, Set<string>>();

  /**
   * File id under every token
   */
  add(id: string, tokens: Iterable<string>): void {
    for (const token of tokens) {
      let bucket = this.#buckets.get(token);
      if (!bucket) {
        bucket = new Set();
        this.#buckets.set(token, bucket);
      }
      bucket.add(id);
    }
  }

  /**
   * Remove id from every token's bucket, dropping buckets left empty
   */
  remove(id: string, tokens: Iterable<string>): void {
    for (const token of tokens) {
      const bucket = this.#buckets.get(token);
      if (!bucket) continue;

      bucket.delete(id);
      if (bucket.size === 0) {
        this.#buckets.delete(token);
      }
    }
  }

  /**
   * Ids filed under a token (read-only view)
   */
  lookup(token: string): ReadonlySet<string> | undefined {
    return this.#buckets.get(token);
  }

  /**
   * All token → ids entries
   */
  entries(): IterableIterator<[string, ReadonlySet<string>]> {
    return this.#buckets.entries();
  }

  /**
   * Number of distinct tokens
   */
  get size(): number {
    return this.#buckets.size;
  }

  clear(): void {
    this.#buckets.clear();
  }
}

/**
 * Unique index: key → single record id
 */
export class UniqueIndex {
  #owners = new Map<string, string>();

  /**
   * Owner of a key, if any
   */
  lookup(key: string): string | undefined {
    return this.#owners.get(key);
  }

  /**
   * Owner of key when it is someone other than id
   */
  ownerOtherThan(key: string, id: string): string | undefined {
    const owner = this.#owners.get(key);
    return owner !== undefined && owner !== id ? owner : undefined;
  }

  set(key: string, id: string): void {
    this.#owners.set(key, id);
  }

  /**
   * Remove key only if it still belongs to id
   */
  release(key: string, id: string): void {
    if (this.#owners.get(key) === id) {
      this.#owners.delete(key);
    }
  }

  entries(): IterableIterator<[string, string]> {
    return this.#owners.entries();
  }

  get size(): number {
    return this.#owners.size;
  }

  clear(): void {
    this.#owners.clear();
  }
}
