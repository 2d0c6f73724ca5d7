import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const sdkSource = (file: string) =>
  fileURLToPath(new URL(`./packages/sdk/src/${file}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@agentlink\/sdk\/testing$/, replacement: sdkSource("testing.ts") },
      { find: /^@agentlink\/sdk$/, replacement: sdkSource("index.ts") },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    globals: true,
    environment: "node",
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
  },
});
