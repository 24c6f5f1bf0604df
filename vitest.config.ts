import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));
const isCI = process.env.CI === "1" || process.env.CI === "true";
const pool = process.env.VITEST_POOL === "forks" || (process.env.VITEST_POOL === undefined && isCI) ? "forks" : "threads";

export default defineConfig({
  resolve: {
    alias: {
      "poster-engine": path.resolve(rootDir, "engine/src/index.ts"),
      "poster-ingestion": path.resolve(rootDir, "ingestion/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts", "tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "0",
    },
    pool,
    poolOptions: {
      threads: {
        singleThread: isCI,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 60000 : 30000,
    hookTimeout: isCI ? 60000 : 30000,
    slowTestThreshold: isCI ? 4000 : 2000,
  },
});
