import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/cli/main.ts"],
      thresholds: {
        branches: 65,
        functions: 85,
        lines: 80,
        statements: 80,
      },
      reporter: ["text", "html", "json"],
    },

    // Temp directories per test file
    pool: "forks",

    testTimeout: 30000,
  },
});
