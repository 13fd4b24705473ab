import { describe, it, expect, vi } from "vitest";
import { Approach } from "./models.js";
import { filterApproaches, limit, matchesAll } from "./query.js";
import type { ApproachPredicate } from "./types.js";

function predicate(result: boolean) {
  const test = vi.fn((_approach: Approach) => result);
  const check: ApproachPredicate = { test };
  return { check, test };
}

function* counted<T>(items: readonly T[], pulled: { count: number }): Generator<T> {
  for (const item of items) {
    pulled.count++;
    yield item;
  }
}

describe("matchesAll", () => {
  const approach = new Approach({ designation: "433" });

  it("should accept when there are no predicates", () => {
    expect(matchesAll(approach, [])).toBe(true);
  });

  it("should stop at the first failing predicate", () => {
    const pass = predicate(true);
    const fail = predicate(false);
    const never = predicate(true);

    expect(matchesAll(approach, [pass.check, fail.check, never.check])).toBe(false);
    expect(pass.test).toHaveBeenCalledTimes(1);
    expect(fail.test).toHaveBeenCalledWith(approach);
    expect(never.test).not.toHaveBeenCalled();
  });
});

describe("filterApproaches", () => {
  const approaches = ["a", "b", "c"].map((designation) => new Approach({ designation }));

  it("should yield everything without predicates", () => {
    expect(Array.from(filterApproaches(approaches))).toEqual(approaches);
  });

  it("should keep source order", () => {
    const notB: ApproachPredicate = { test: (a) => a.designation !== "b" };

    expect(Array.from(filterApproaches(approaches, [notB])).map((a) => a.designation)).toEqual([
      "a",
      "c",
    ]);
  });

  it("should evaluate lazily", () => {
    const { check, test } = predicate(true);
    const results = filterApproaches(approaches, [check]);

    expect(test).not.toHaveBeenCalled();
    results.next();
    expect(test).toHaveBeenCalledTimes(1);
  });
});

describe("limit", () => {
  const items = [1, 2, 3, 4, 5];

  it("should pass the source through for no cap", () => {
    expect(limit(items)).toBe(items);
    expect(limit(items, 0)).toBe(items);
  });

  it("should yield at most cap items", () => {
    expect(Array.from(limit(items, 3))).toEqual([1, 2, 3]);
    expect(Array.from(limit(items, 10))).toEqual(items);
  });

  it("should never pull more than cap items", () => {
    const pulled = { count: 0 };

    expect(Array.from(limit(counted(items, pulled), 2))).toEqual([1, 2]);
    expect(pulled.count).toBe(2);
  });

  it("should reject a negative or fractional cap eagerly", () => {
    expect(() => limit(items, -1)).toThrow(RangeError);
    expect(() => limit(items, 1.5)).toThrow("limit must be a non-negative integer, got 1.5");
  });
});
