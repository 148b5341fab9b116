import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // integration and e2e tests shell out to git
    testTimeout: 30_000,
  },
});
