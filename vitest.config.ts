// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["apps/*/tests/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    testTimeout: 15_000,
  },
});
