/**
 * Core types for the NEO catalogue
 */

import type { Approach, Neo } from "./models.js";

/**
 * Raw field value as it arrives from an ingestion source
 */
export type RawField = string | number | boolean | null | undefined;

/**
 * Unnormalized NEO fields, as read from the NEO feed
 */
export interface NeoRecord {
  /** Primary designation (e.g. "433") */
  designation?: RawField;
  /** IAU name, if any */
  name?: RawField;
  /** Diameter in kilometres */
  diameter?: RawField;
  /** "Y" when potentially hazardous */
  hazardous?: RawField;
}

/**
 * Unnormalized close-approach fields, as read from the CAD feed
 */
export interface ApproachRecord {
  /** Designation of the approaching NEO (foreign key) */
  designation?: RawField;
  /** Compact timestamp such as "2020-Jan-01 00:00", or a Date */
  time?: RawField | Date;
  /** Nominal approach distance in au */
  distance?: RawField;
  /** Relative velocity in km/s */
  velocity?: RawField;
}

/**
 * Linking strategy
 * - "scan": nested loops, correctness baseline
 * - "indexed": single pass against a designation map
 * - "auto": scan for small inputs, indexed otherwise
 */
export type LinkStrategy = "auto" | "indexed" | "scan";

/**
 * Approaches grouped by normalized designation
 */
export type GroupedApproaches = ReadonlyMap<string, readonly Approach[]>;

export type NeoSource = Iterable<Neo> | ReadonlyMap<string, Neo>;

export type ApproachSource = Iterable<Approach> | GroupedApproaches;

/**
 * Emitted once when linking completes
 */
export interface LinkProgress {
  strategy: Exclude<LinkStrategy, "auto">;
  linked: number;
  unmatched: number;
  total: number;
}

export interface LinkOptions {
  /** Linking strategy (default: "auto") */
  strategy?: LinkStrategy;
  /** Observability hook; never required for correctness */
  onProgress?: (progress: LinkProgress) => void;
}

/**
 * Outcome of linking, in stored order
 */
export interface LinkResult {
  neos: readonly Neo[];
  approaches: readonly Approach[];
  linked: number;
  unmatched: number;
  strategy: Exclude<LinkStrategy, "auto">;
}

/**
 * Fields a filter can compare
 */
export type FilterField = "date" | "distance" | "velocity" | "diameter" | "hazardous";

export type Comparator = "eq" | "le" | "ge";

/**
 * Value compared by a field: calendar day string for dates, number or boolean otherwise
 */
export type FilterValue = string | number | boolean;

/**
 * Policy for NEO-scoped filters evaluated on an approach with no linked NEO
 * - "exclude": the approach does not match
 * - "throw": UnlinkedApproachError
 */
export type UnlinkedPolicy = "exclude" | "throw";

export interface FilterOptions {
  /** Missing linkage policy (default: "exclude") */
  unlinked?: UnlinkedPolicy;
}

/**
 * A unary test over an approach
 */
export interface ApproachPredicate {
  test(approach: Approach): boolean;
}

/**
 * Options for constructing a NeoDatabase
 */
export type DatabaseOptions = LinkOptions;
