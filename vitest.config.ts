import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    clearMocks: true,
    restoreMocks: true,
    // PDF composition of whole batches runs in a few of the suites
    testTimeout: 30000,
    hookTimeout: 20000,
  },
});
