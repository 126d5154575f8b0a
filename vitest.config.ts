import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    watch: false,
    // better-sqlite3 is a native add-on; keep each file in its own process
    pool: "forks",
    testTimeout: 20_000,
  },
});
