import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["bot/tests/**/*.test.ts"],
    testTimeout: 10_000,
    restoreMocks: true,
  },
});
