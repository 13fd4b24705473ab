/**
 * NEO Scope SDK
 *
 * In-memory catalogue of near-Earth objects and their close approaches
 */

// Re-export types
export type {
  RawField,
  NeoRecord,
  ApproachRecord,
  LinkStrategy,
  GroupedApproaches,
  NeoSource,
  ApproachSource,
  LinkProgress,
  LinkOptions,
  LinkResult,
  FilterField,
  Comparator,
  FilterValue,
  UnlinkedPolicy,
  FilterOptions,
  ApproachPredicate,
  DatabaseOptions,
} from "./types.js";

// Models
export { Neo, Approach } from "./models.js";
export type { NeoRow, NeoJson, ApproachRow, ApproachJson } from "./models.js";

// Core
export { NeoDatabase } from "./database.js";
export { NeoIndex } from "./indexes.js";
export { linkApproaches, groupApproaches, resolveStrategy, SCAN_THRESHOLD } from "./linker.js";
export {
  AttributeFilter,
  FilterCriteriaSchema,
  createFilter,
  createFilters,
  isComparator,
  isFilterField,
} from "./filters.js";
export type { FilterCriteria } from "./filters.js";
export { filterApproaches, limit, matchesAll } from "./query.js";

// Utilities
export {
  normalizeText,
  normalizeKey,
  parseDiameter,
  parseMeasurement,
  parseHazardous,
  parseApproachTime,
  toCalendarDay,
  formatTimestamp,
} from "./normalize.js";

// Ingestion and output
export { loadNeos, loadApproaches } from "./extract.js";
export { toCsv, toJson, writeToCsv, writeToJson, CSV_COLUMNS } from "./write.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogData } from "./observability/logs.js";

// Errors
export {
  NeoScopeError,
  UnsupportedCriterionError,
  InvalidCriterionError,
  UnlinkedApproachError,
  AlreadyLinkedError,
  SourceFormatError,
  OutputWriteError,
} from "./errors.js";
