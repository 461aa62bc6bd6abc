import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages publish built JS; tests run against the sources
    alias: {
      "@jarkit/engine": path.resolve(__dirname, "engine/src/index.ts"),
    },
  },
  test: {
    root: ".",
    include: ["engine/tests/**/*.test.ts", "cli/tests/**/*.test.ts"],
    globals: false,
    testTimeout: 10000,
  },
});
