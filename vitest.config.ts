import { defineConfig } from "vitest/config";

// Workspace packages resolve through node_modules to their TypeScript sources.
export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/tests/**/*.test.ts",
      "packages/*/src/**/*.test.ts",
      "tests/**/*.test.ts",
    ],
  },
});
