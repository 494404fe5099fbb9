import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // the logger forwards to parentPort inside worker threads
    pool: "forks",
    include: ["packages/*/src/**/*.test.mts"],
  },
});
