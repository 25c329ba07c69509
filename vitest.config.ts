import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages export built JS at runtime; tests load their sources
const source = (entry: string) => fileURLToPath(new URL(entry, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@slotbank/sdk": source("./packages/sdk/src/index.ts"),
      "@slotbank/testkit": source("./packages/testkit/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    testTimeout: 15000,
    hookTimeout: 15000,
  },
});
