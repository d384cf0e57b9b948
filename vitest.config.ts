import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    globals: false,
    pool: "forks",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
