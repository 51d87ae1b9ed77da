import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./src/test/setup.ts"],
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],

    // Timeouts
    testTimeout: 15_000,
    hookTimeout: 10_000,
    teardownTimeout: 5000,

    // Clear mocks between tests
    clearMocks: true,
    restoreMocks: true,
  },
});
