import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@skill-readiness/core": path.resolve(root, "packages", "core", "src", "index.ts"),
      "@skill-readiness/catalog": path.resolve(root, "packages", "catalog", "src", "index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"]
  }
});
