/**
 * Performance benchmarks for linking and querying
 * Run with: npm run bench
 */

import { describe, it, expect } from "vitest";
import { createFilters } from "../src/filters.js";
import { linkApproaches } from "../src/linker.js";
import { Approach, Neo } from "../src/models.js";
import { NeoDatabase } from "../src/database.js";
import type { LinkStrategy } from "../src/types.js";

function seed(neoCount: number, perNeo: number): { neos: Neo[]; approaches: Approach[] } {
  const neos: Neo[] = [];
  const approaches: Approach[] = [];
  for (let i = 0; i < neoCount; i++) {
    neos.push(new Neo({ designation: `2000 X${i}`, diameter: String((i % 50) / 10) }));
    for (let j = 0; j < perNeo; j++) {
      approaches.push(
        new Approach({
          designation: `2000 x${i}`,
          time: `${2000 + (j % 100)}-Jan-${(i % 28) + 1} 12:00`,
          distance: String((j % 10) / 20),
          velocity: String(5 + (j % 20)),
        })
      );
    }
  }
  return { neos, approaches };
}

describe("Linker Performance Benchmarks", () => {
  const strategies: LinkStrategy[] = ["scan", "indexed"];

  for (const strategy of strategies) {
    it(`2000 NEOs x 5 approaches, ${strategy}`, () => {
      const { neos, approaches } = seed(2000, 5);

      const start = Date.now();
      const result = linkApproaches(neos, approaches, { strategy });
      const duration = Date.now() - start;

      console.log(`${strategy}: linked ${result.linked} approaches in ${duration}ms`);
      expect(result.linked).toBe(10000);
    });
  }

  it("20000 NEOs x 10 approaches, auto + query < 1000ms", () => {
    const { neos, approaches } = seed(20000, 10);

    const start = Date.now();
    const db = new NeoDatabase(neos, approaches);
    const hits = Array.from(db.query(createFilters({ distanceMax: 0.1, diameterMin: 2 })));
    const duration = Date.now() - start;

    console.log(`auto (${db.linkResult.strategy}): ${hits.length} results in ${duration}ms`);
    expect(db.linkResult.strategy).toBe("indexed");
    expect(duration).toBeLessThanOrEqual(1000);
  });
});
