import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // No pino transport workers during tests.
    env: {
      AGENT_LOG_LEVEL: "silent",
    },
    testTimeout: 10_000,
  },
});
