import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@apptrack/engine": path.join(__dirname, "engine", "src", "index.ts"),
      "@apptrack/catalog": path.join(__dirname, "catalog", "src", "index.ts"),
    },
  },
  test: {
    root: ".",
    include: [
      "engine/tests/**/*.test.ts",
      "catalog/tests/**/*.test.ts",
      "cli/tests/**/*.test.ts",
    ],
    globals: false,
    testTimeout: 10000,
  },
});
