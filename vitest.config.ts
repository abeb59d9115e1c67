// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files so PROMISING_* settings reach tests that read them
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      // Exhaustive litmus exploration can take a while
      testTimeout: 60_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
