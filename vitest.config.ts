import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 30000,
    env: {
      // Quiet the stderr log during test runs.
      LOG_LEVEL: "error",
    },
  },
});
