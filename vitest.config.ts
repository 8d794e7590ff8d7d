// vitest.config.ts
// Tests run fully offline: every engine is a scripted stand-in.

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["stages/**/test/**/*.test.ts"],
    environment: "node",
    pool: "threads",
    testTimeout: 10_000,
  },
});
