// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files so TLGEN_* overrides reach config tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      // Generated-code tests write and import a full output tree
      testTimeout: 30_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
