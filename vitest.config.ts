import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*_test.ts"],
    // Lifetime tests force collections through `globalThis.gc`
    pool: "forks",
    poolOptions: {
      forks: { execArgv: ["--expose-gc"] },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
