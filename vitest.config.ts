import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 10000,
  },
});
