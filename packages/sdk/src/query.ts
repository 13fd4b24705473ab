/**
 * Lazy evaluation of approach filters
 */

import type { Approach } from "./models.js";
import type { ApproachPredicate } from "./types.js";

/**
 * Test an approach against every predicate, stopping at the first failure
 */
export function matchesAll(approach: Approach, predicates: readonly ApproachPredicate[]): boolean {
  for (const predicate of predicates) {
    if (!predicate.test(approach)) {
      return false;
    }
  }
  return true;
}

/**
 * Yield the approaches that pass every predicate, in source order
 */
export function* filterApproaches(
  approaches: Iterable<Approach>,
  predicates: Iterable<ApproachPredicate> = []
): Generator<Approach, void, undefined> {
  const checks = Array.from(predicates);
  for (const approach of approaches) {
    if (matchesAll(approach, checks)) {
      yield approach;
    }
  }
}

function* take<T>(source: Iterable<T>, cap: number): Generator<T, void, undefined> {
  let count = 0;
  for (const item of source) {
    yield item;
    count++;
    // Stop before pulling the next item from a lazy source
    if (count >= cap) return;
  }
}

/**
 * Yield at most `cap` items from the front of `source`
 *
 * `undefined` or 0 means unlimited.
 * @throws RangeError for a negative or fractional cap
 */
export function limit<T>(source: Iterable<T>, cap?: number): Iterable<T> {
  if (cap === undefined || cap === 0) {
    return source;
  }
  if (!Number.isInteger(cap) || cap < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${cap}`);
  }
  return take(source, cap);
}
