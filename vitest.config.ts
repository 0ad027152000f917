import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/__tests__/**/*.test.ts"],
    // Executor and server tests spawn real processes
    testTimeout: 15_000,
  },
});
