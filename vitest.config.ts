import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@waypoint/core": path.resolve(root, "packages/core/src/index.ts"),
      "@waypoint/server": path.resolve(root, "packages/server/src/index.ts"),
    },
  },
  test: {
    globals: true,
    testTimeout: 30_000,
    pool: "forks",
    include: ["packages/*/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
  },
});
