import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "banking-api-client",
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 10000,
  },
});
