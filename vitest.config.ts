import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // jest-like globals (describe, it, expect) without importing them everywhere.
    globals: true,
    // Everything here talks to fs and fetch, so no browser simulation.
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 70,
        statements: 80,
      },
      include: ["src/**/*.ts"],
      exclude: ["src/models/**", "src/index.ts", "**/*.test.ts"],
    },
  },
});
