/**
 * Lookup indexes over a NEO collection
 *
 * Invariants:
 * - Keys are normalized (trimmed, lower-cased) designations and names
 * - Duplicate keys resolve to the first NEO in construction order
 * - NEOs without a name are never candidates for name lookup
 * - Lookups never mutate
 */

import type { Neo } from "./models.js";
import { normalizeKey } from "./normalize.js";

export class NeoIndex {
  #byDesignation = new Map<string, Neo>();
  #byName = new Map<string, Neo>();

  constructor(neos: Iterable<Neo>) {
    for (const neo of neos) {
      const designation = normalizeKey(neo.designation);
      if (designation !== undefined && !this.#byDesignation.has(designation)) {
        this.#byDesignation.set(designation, neo);
      }

      const name = normalizeKey(neo.name);
      if (name !== undefined && !this.#byName.has(name)) {
        this.#byName.set(name, neo);
      }
    }
  }

  /** Number of distinct designations */
  get size(): number {
    return this.#byDesignation.size;
  }

  /**
   * Exact, case-insensitive designation match
   */
  findByDesignation(designation: string | null | undefined): Neo | undefined {
    const key = normalizeKey(designation);
    return key === undefined ? undefined : this.#byDesignation.get(key);
  }

  /**
   * Exact, case-insensitive name match
   */
  findByName(name: string | null | undefined): Neo | undefined {
    const key = normalizeKey(name);
    return key === undefined ? undefined : this.#byName.get(key);
  }
}
