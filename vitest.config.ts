import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: ".",
    include: ["tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    env: {
      CONTEXT_MEMORY_LOG_LEVEL: "error",
    },
  },
});
