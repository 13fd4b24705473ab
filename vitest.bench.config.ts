import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/benchmarks/**/*.bench.ts"],
    testTimeout: 60000,
  },
});
