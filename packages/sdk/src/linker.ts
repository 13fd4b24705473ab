/**
 * Linking of close approaches to their NEOs
 *
 * Invariants:
 * - Designations match case-insensitively after trimming; absent keys never match
 * - Each approach links to the first NEO (construction order) with its key
 * - Within a NEO, approaches keep their input order
 * - An approach that already has a NEO is left alone, so linking twice never double-links
 * - Every strategy yields the same linkage for the same input
 */

import type { Approach, Neo } from "./models.js";
import { normalizeKey } from "./normalize.js";
import { logger } from "./observability/logs.js";
import type {
  ApproachSource,
  GroupedApproaches,
  LinkOptions,
  LinkResult,
  LinkStrategy,
  NeoSource,
} from "./types.js";

/**
 * Largest NEO × approach product that "auto" still links by scanning
 */
export const SCAN_THRESHOLD = 10_000;

/**
 * Key under which groupApproaches keeps approaches with no designation
 */
export const UNKEYED_GROUP = "";

// Any ReadonlyMap, not only Map instances; plain iterables have no get()
function isMapLike(source: object): boolean {
  return (
    "get" in source &&
    typeof source.get === "function" &&
    "values" in source &&
    typeof source.values === "function"
  );
}

function isGrouped(source: ApproachSource): source is GroupedApproaches {
  return isMapLike(source);
}

function isNeoMap(source: NeoSource): source is ReadonlyMap<string, Neo> {
  return isMapLike(source);
}

function listNeos(source: NeoSource): Neo[] {
  return isNeoMap(source) ? Array.from(source.values()) : Array.from(source);
}

function flattenApproaches(source: ApproachSource): Approach[] {
  if (isGrouped(source)) {
    const flat: Approach[] = [];
    for (const group of source.values()) {
      flat.push(...group);
    }
    return flat;
  }
  return Array.from(source);
}

/**
 * Group approaches by normalized designation, preserving input order
 */
export function groupApproaches(approaches: Iterable<Approach>): Map<string, Approach[]> {
  const groups = new Map<string, Approach[]>();
  for (const approach of approaches) {
    const key = normalizeKey(approach.designation) ?? UNKEYED_GROUP;
    let group = groups.get(key);
    if (!group) {
      group = [];
      groups.set(key, group);
    }
    group.push(approach);
  }
  return groups;
}

export function resolveStrategy(
  strategy: LinkStrategy,
  neoCount: number,
  approachCount: number
): Exclude<LinkStrategy, "auto"> {
  if (strategy !== "auto") return strategy;
  return neoCount * approachCount <= SCAN_THRESHOLD ? "scan" : "indexed";
}

function linkByScan(neos: readonly Neo[], approaches: readonly Approach[]): number {
  let linked = 0;
  for (const neo of neos) {
    const key = normalizeKey(neo.designation);
    if (key === undefined) continue;

    for (const approach of approaches) {
      if (approach.neo !== undefined) continue;
      if (normalizeKey(approach.designation) === key) {
        neo.attach(approach);
        linked++;
      }
    }
  }
  return linked;
}

function linkByIndex(neos: readonly Neo[], approaches: readonly Approach[]): number {
  const byKey = new Map<string, Neo>();
  for (const neo of neos) {
    const key = normalizeKey(neo.designation);
    if (key !== undefined && !byKey.has(key)) {
      byKey.set(key, neo);
    }
  }

  let linked = 0;
  for (const approach of approaches) {
    if (approach.neo !== undefined) continue;
    const key = normalizeKey(approach.designation);
    const neo = key === undefined ? undefined : byKey.get(key);
    if (neo) {
      neo.attach(approach);
      linked++;
    }
  }
  return linked;
}

function linkByGroup(neos: readonly Neo[], groups: GroupedApproaches): number {
  let linked = 0;
  for (const neo of neos) {
    const key = normalizeKey(neo.designation);
    if (key === undefined) continue;

    for (const approach of groups.get(key) ?? []) {
      // Groups keyed by hand may hold strays; the key is re-checked
      if (approach.neo !== undefined) continue;
      if (normalizeKey(approach.designation) === key) {
        neo.attach(approach);
        linked++;
      }
    }
  }
  return linked;
}

/**
 * Link approaches to their NEOs in place
 *
 * Mutates both inputs: each matched approach gets its `neo` set and is
 * appended to that NEO's approaches. Intended as a one-time initialization.
 *
 * @param neoSource - NEOs, as a sequence or a designation-keyed map
 * @param approachSource - Approaches, as a sequence or pre-grouped by normalized designation
 * @returns The linked collections in stored order, with counts
 */
export function linkApproaches(
  neoSource: NeoSource,
  approachSource: ApproachSource,
  options: LinkOptions = {}
): LinkResult {
  const neos = listNeos(neoSource);
  const approaches = flattenApproaches(approachSource);
  const strategy = resolveStrategy(options.strategy ?? "auto", neos.length, approaches.length);

  let linked: number;
  if (strategy === "scan") {
    linked = linkByScan(neos, approaches);
  } else if (isGrouped(approachSource)) {
    linked = linkByGroup(neos, approachSource);
  } else {
    linked = linkByIndex(neos, approaches);
  }

  let unmatched = 0;
  for (const approach of approaches) {
    if (approach.neo === undefined) unmatched++;
  }

  const progress = { strategy, linked, unmatched, total: approaches.length };
  logger.debug("link.complete", { details: { ...progress, neos: neos.length } });
  options.onProgress?.(progress);

  return { neos, approaches, linked, unmatched, strategy };
}
