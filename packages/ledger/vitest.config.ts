import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "ledger",
    include: ["tests/**/*.test.ts"],
    // fast-check properties in property.test.ts
    testTimeout: 20_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/types.ts"],
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 95,
        lines: 95,
      },
    },
  },
});
