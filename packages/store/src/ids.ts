/**
 * Identifier generators
 */

import { randomUUID } from "node:crypto";
import type { IdGenerator } from "./types.js";

/**
 * Default generator: random 128-bit UUID (v4)
 */
export const uuidIds: IdGenerator = () => randomUUID();

/**
 * Monotonic counter plus tag
 *
 * Ids sort in creation order and never repeat for the generator's lifetime.
 *
 * @example
 * const next = sequentialIds("c");
 * next(); // "c-00000001"
 * next(); // "c-00000002"
 */
export function sequentialIds(tag: string): IdGenerator {
  let counter = 0;
  return () => {
    counter++;
    return `${tag}-${counter.toString(36).padStart(8, "0")}`;
  };
}
