import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/**/*.spec.ts", "packages/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    coverage: {
      clean: true,
      reporter: ["text", "json-summary", "lcov"],
      provider: "v8",
      include: ["apps/*/src/**", "packages/*/src/**"],
    },
  },
});
