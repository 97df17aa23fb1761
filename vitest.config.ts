// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.spec.ts"],
    setupFiles: ["test/setup.ts"],
    hookTimeout: 15_000,
    testTimeout: 15_000,
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
});
