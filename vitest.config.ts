import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
    // DuckDB writes real Parquet files in the SQL tests
    testTimeout: 20_000,
  },
});
