import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/*.integration.test.ts"],
    testTimeout: 10000, // fake servers answer immediately
    hookTimeout: 10000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
