/**
 * In-memory catalogue of NEOs and their close approaches
 *
 * Construction links the collections once; afterwards the database is
 * read-only and safe to share between any number of readers.
 */

import { NeoIndex } from "./indexes.js";
import { linkApproaches } from "./linker.js";
import type { Approach, Neo } from "./models.js";
import { filterApproaches } from "./query.js";
import type {
  ApproachPredicate,
  ApproachSource,
  DatabaseOptions,
  LinkResult,
  NeoSource,
} from "./types.js";

export class NeoDatabase {
  readonly #link: LinkResult;
  readonly #index: NeoIndex;

  /**
   * Link the supplied collections and index the NEOs
   *
   * Both inputs are mutated in place and must not have been linked before.
   */
  constructor(neos: NeoSource, approaches: ApproachSource, options: DatabaseOptions = {}) {
    this.#link = linkApproaches(neos, approaches, options);
    this.#index = new NeoIndex(this.#link.neos);
  }

  get neos(): readonly Neo[] {
    return this.#link.neos;
  }

  /** Approaches in stored order */
  get approaches(): readonly Approach[] {
    return this.#link.approaches;
  }

  get linkResult(): LinkResult {
    return this.#link;
  }

  getNeoByDesignation(designation: string | null | undefined): Neo | undefined {
    return this.#index.findByDesignation(designation);
  }

  getNeoByName(name: string | null | undefined): Neo | undefined {
    return this.#index.findByName(name);
  }

  /**
   * Stream the approaches matching every filter
   *
   * No filters yields every approach. Results come in stored order, which is
   * not guaranteed to be chronological. The stream is lazy; stop pulling to stop early.
   */
  query(filters: Iterable<ApproachPredicate> = []): Generator<Approach, void, undefined> {
    return filterApproaches(this.#link.approaches, filters);
  }
}
