/**
 * Vitest configuration
 *
 * Uses the 'projects' format so further test groups can sit beside the unit
 * tests with their own setup files.
 *
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,
    environment: "node",

    // Coverage is only collected by `npm run test:coverage`
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "lcov", "json-summary"],
      reportsDirectory: "./coverage",
      skipFull: true,
      cleanOnRerun: true,
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "**/*.d.ts"],
      thresholds: {
        lines: 90,
        branches: 85,
        functions: 90,
        statements: 90,
      },
    },

    projects: [
      {
        extends: true,
        test: {
          name: "unit",
          include: ["tests/unit/**/*.test.ts"],
          setupFiles: ["./tests/setup.ts"],
        },
      },
    ],
  },
});
