/**
 * Reader/writer exclusion for the store's shared state
 *
 * Store operations are synchronous, so callers on the event loop only
 * interleave between operations. A call made from inside a section (a custom
 * id generator that searches the store, for instance) throws
 * LockViolationError.
 *
 * Rules:
 * - Reads may nest inside reads
 * - A write is exclusive with every other section, including nested ones
 */

import { LockViolationError } from "./errors.js";

export class ReadWriteLock {
  #readers = 0;
  #writing = false;

  /**
   * Run fn inside a shared read section
   */
  read<T>(fn: () => T): T {
    if (this.#writing) {
      throw new LockViolationError("read", "write");
    }

    this.#readers++;
    try {
      return fn();
    } finally {
      this.#readers--;
    }
  }

  /**
   * Run fn inside an exclusive write section
   */
  write<T>(fn: () => T): T {
    if (this.#writing) {
      throw new LockViolationError("write", "write");
    }
    if (this.#readers > 0) {
      throw new LockViolationError("write", "read");
    }

    this.#writing = true;
    try {
      return fn();
    } finally {
      this.#writing = false;
    }
  }

  /**
   * Number of read sections currently held
   */
  get readers(): number {
    return this.#readers;
  }

  /**
   * Check if a write section is held
   */
  isWriting(): boolean {
    return this.#writing;
  }
}
