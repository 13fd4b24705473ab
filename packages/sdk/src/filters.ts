/**
 * Filters over close approaches
 *
 * A filter is an immutable (field, comparator, value) triple. Fields form a
 * closed set; each maps to an accessor over the approach or its linked NEO.
 *
 * Semantics:
 * - Filters combine by conjunction only
 * - "date" compares the UTC calendar day (YYYY-MM-DD), ignoring time of day
 * - Numeric fields compare at full precision; NaN never matches
 * - NEO-scoped fields on an unlinked approach follow the unlinked policy
 */

import { z } from "zod";
import {
  InvalidCriterionError,
  UnlinkedApproachError,
  UnsupportedCriterionError,
} from "./errors.js";
import type { Approach, Neo } from "./models.js";
import { toCalendarDay } from "./normalize.js";
import type {
  ApproachPredicate,
  Comparator,
  FilterField,
  FilterOptions,
  FilterValue,
  UnlinkedPolicy,
} from "./types.js";

type FieldAccessor =
  | { scope: "approach"; kind: "day" | "number"; read: (approach: Approach) => FilterValue | undefined }
  | { scope: "neo"; kind: "number" | "boolean"; read: (neo: Neo) => FilterValue };

const FIELDS: Record<FilterField, FieldAccessor> = {
  date: { scope: "approach", kind: "day", read: (approach) => toCalendarDay(approach.time) },
  distance: { scope: "approach", kind: "number", read: (approach) => approach.distance },
  velocity: { scope: "approach", kind: "number", read: (approach) => approach.velocity },
  diameter: { scope: "neo", kind: "number", read: (neo) => neo.diameter },
  hazardous: { scope: "neo", kind: "boolean", read: (neo) => neo.hazardous },
};

const COMPARATORS: Record<Comparator, { symbol: string; accepts: (cmp: number) => boolean }> = {
  eq: { symbol: "==", accepts: (cmp) => cmp === 0 },
  le: { symbol: "<=", accepts: (cmp) => cmp <= 0 },
  ge: { symbol: ">=", accepts: (cmp) => cmp >= 0 },
};

export function isFilterField(value: string): value is FilterField {
  return Object.hasOwn(FIELDS, value);
}

export function isComparator(value: string): value is Comparator {
  return Object.hasOwn(COMPARATORS, value);
}

/**
 * Compare two values of the same primitive type
 * @returns Negative, zero or positive; undefined when incomparable (NaN, mixed types)
 */
function compareValues(actual: FilterValue, expected: FilterValue): number | undefined {
  if (typeof actual === "number" && typeof expected === "number") {
    if (Number.isNaN(actual) || Number.isNaN(expected)) return undefined;
    return actual - expected;
  }
  if (typeof actual === "string" && typeof expected === "string") {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  if (typeof actual === "boolean" && typeof expected === "boolean") {
    return Number(actual) - Number(expected);
  }
  return undefined;
}

/**
 * Check a reference value against its field
 * @returns The value to compare with; dates become their calendar day
 */
function checkValueKind(field: FilterField, value: FilterValue): FilterValue {
  const { kind } = FIELDS[field];
  if (kind === "day") {
    const day = typeof value === "string" ? toCalendarDay(value) : undefined;
    if (day !== undefined) return day;
  } else if (typeof value === kind) {
    return value;
  }
  const expected = kind === "day" ? "a calendar day (YYYY-MM-DD)" : `a ${kind}`;
  throw new InvalidCriterionError(field, `expected ${expected}, got ${JSON.stringify(value)}`);
}

/**
 * A single comparison of an approach attribute against a reference value
 */
export class AttributeFilter implements ApproachPredicate {
  readonly value: FilterValue;
  readonly #unlinked: UnlinkedPolicy;

  constructor(
    readonly field: FilterField,
    readonly op: Comparator,
    value: FilterValue,
    options: FilterOptions = {}
  ) {
    this.value = checkValueKind(field, value);
    this.#unlinked = options.unlinked ?? "exclude";
  }

  test(approach: Approach): boolean {
    const accessor = FIELDS[this.field];
    let actual: FilterValue | undefined;

    if (accessor.scope === "neo") {
      if (approach.neo === undefined) {
        if (this.#unlinked === "throw") {
          throw new UnlinkedApproachError(approach.designation, this.field);
        }
        return false;
      }
      actual = accessor.read(approach.neo);
    } else {
      actual = accessor.read(approach);
    }

    if (actual === undefined) return false;
    const cmp = compareValues(actual, this.value);
    return cmp !== undefined && COMPARATORS[this.op].accepts(cmp);
  }

  toString(): string {
    return `${this.field} ${COMPARATORS[this.op].symbol} ${String(this.value)}`;
  }
}

/**
 * Build a filter from loosely typed parts
 *
 * Date values may be a Date or a YYYY-MM-DD string.
 * @throws UnsupportedCriterionError for an unknown field or comparator
 * @throws InvalidCriterionError when the value does not suit the field
 */
export function createFilter(
  field: string,
  op: string,
  value: FilterValue | Date,
  options?: FilterOptions
): AttributeFilter {
  if (!isFilterField(field)) {
    throw new UnsupportedCriterionError(field);
  }
  if (!isComparator(op)) {
    throw new UnsupportedCriterionError(`${field} ${op}`);
  }

  let normalized: FilterValue;
  if (value instanceof Date) {
    const day = FIELDS[field].kind === "day" ? toCalendarDay(value) : undefined;
    if (day === undefined) {
      throw new InvalidCriterionError(field, `unusable date ${String(value)}`);
    }
    normalized = day;
  } else {
    normalized = value;
  }

  return new AttributeFilter(field, op, normalized, options);
}

const DaySchema = z.union([z.date(), z.string()]).transform((value, ctx) => {
  const day = toCalendarDay(value);
  if (day === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "expected a date as YYYY-MM-DD",
    });
    return z.NEVER;
  }
  return day;
});

const NumberSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

/**
 * Recognized query criteria; each is optional and null means "no constraint"
 */
export const FilterCriteriaSchema = z.object({
  date: DaySchema.nullish(),
  startDate: DaySchema.nullish(),
  endDate: DaySchema.nullish(),
  distanceMin: NumberSchema.nullish(),
  distanceMax: NumberSchema.nullish(),
  velocityMin: NumberSchema.nullish(),
  velocityMax: NumberSchema.nullish(),
  diameterMin: NumberSchema.nullish(),
  diameterMax: NumberSchema.nullish(),
  hazardous: z.boolean().nullish(),
});

export type FilterCriteria = z.input<typeof FilterCriteriaSchema>;

type CriterionKey = keyof FilterCriteria;

/**
 * Criterion → (field, comparator), in the order filters are produced
 */
const CRITERIA: ReadonlyArray<readonly [CriterionKey, FilterField, Comparator]> = [
  ["date", "date", "eq"],
  ["startDate", "date", "ge"],
  ["endDate", "date", "le"],
  ["distanceMin", "distance", "ge"],
  ["distanceMax", "distance", "le"],
  ["velocityMin", "velocity", "ge"],
  ["velocityMax", "velocity", "le"],
  ["diameterMin", "diameter", "ge"],
  ["diameterMax", "diameter", "le"],
  ["hazardous", "hazardous", "eq"],
];

const CRITERION_KEYS: ReadonlySet<string> = new Set(CRITERIA.map(([key]) => key));

/**
 * Create the conjunctive filter set for the supplied criteria
 *
 * One filter per supplied criterion; no criteria yields an empty set.
 * @throws UnsupportedCriterionError for an unrecognized criterion key
 * @throws InvalidCriterionError for a value that cannot be coerced
 */
export function createFilters(
  criteria: FilterCriteria = {},
  options?: FilterOptions
): AttributeFilter[] {
  for (const key of Object.keys(criteria)) {
    if (!CRITERION_KEYS.has(key)) {
      throw new UnsupportedCriterionError(key);
    }
  }

  const result = FilterCriteriaSchema.safeParse(criteria);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0];
    throw new InvalidCriterionError(
      typeof key === "string" ? key : "criteria",
      issue?.message ?? "invalid criteria",
      { cause: result.error }
    );
  }

  const parsed = result.data;
  const filters: AttributeFilter[] = [];
  for (const [key, field, op] of CRITERIA) {
    const value = parsed[key];
    if (value !== undefined && value !== null) {
      filters.push(new AttributeFilter(field, op, value, options));
    }
  }
  return filters;
}
