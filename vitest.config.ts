import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/src/__tests__/**/*.test.ts",
      "apps/*/src/__tests__/**/*.test.ts",
    ],
    setupFiles: ["apps/runner/test/setup-env.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["apps/*/src/**/*.ts", "packages/*/src/**/*.ts"],
      exclude: ["**/__tests__/**", "apps/*/src/index.ts"],
    },
  },
});
