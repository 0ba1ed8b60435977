import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

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
      exclude: ["**/*.test.ts", "**/testing/**", "apps/*/src/bin.ts"],
    },
  },
  resolve: {
    alias: [
      { find: /^@flagline\/sdk\/testing$/, replacement: fromRoot("./packages/sdk/src/testing/index.ts") },
      { find: /^@flagline\/sdk$/, replacement: fromRoot("./packages/sdk/src/index.ts") },
      { find: /^@flagline\/shared$/, replacement: fromRoot("./packages/shared/src/index.ts") },
      { find: /^@flagline\/core$/, replacement: fromRoot("./packages/core/src/index.ts") },
    ],
  },
});
