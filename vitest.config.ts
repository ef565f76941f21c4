import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@perf-budgets/shared", replacement: path.resolve(__dirname, "packages/shared/src") },
      { find: "@perf-budgets/logger", replacement: path.resolve(__dirname, "packages/logger/src") },
      { find: "@perf-budgets/registry", replacement: path.resolve(__dirname, "packages/registry/src") }
    ]
  }
});
