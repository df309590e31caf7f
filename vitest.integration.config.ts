import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/integration-test/**/*.integration.test.ts"],
    exclude: ["**/node_modules/**"],
    testTimeout: 120000, // database creation and startup can be slow
    hookTimeout: 30000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 1, // suites share one daemon, run them one at a time
        minForks: 1,
      }
    },
    fileParallelism: false,
    globals: true,
    environment: 'node',
  },
});
