import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@sprig/outline-core": path.resolve(__dirname, "packages/outline-core/src"),
      "@sprig/raster": path.resolve(__dirname, "packages/raster/src"),
      "@sprig/outline-render": path.resolve(__dirname, "packages/outline-render/src"),
      "@sprig/outline-commands": path.resolve(__dirname, "packages/outline-commands/src")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage"
    }
  }
});
