import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared/test/**/*.test.ts", "server/test/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 15_000,
  },
});
