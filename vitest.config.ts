import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/*/src/**/*.ts", "apps/*/src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/__tests__/**", "**/*.test.ts"],
    },
  },
  resolve: {
    alias: [
      { find: /^@argloom\/sdk\/testing$/, replacement: `${root}packages/sdk/src/testing/index.ts` },
      { find: /^@argloom\/sdk$/, replacement: `${root}packages/sdk/src/index.ts` },
      { find: /^@argloom\/shared$/, replacement: `${root}packages/shared/src/index.ts` },
      { find: /^@argloom\/core$/, replacement: `${root}packages/core/src/index.ts` },
    ],
  },
});
