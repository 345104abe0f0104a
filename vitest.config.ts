import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      STOKERCLOUD_USERNAME: "test-user",
      LOG_LEVEL: "silent",
    },
  },
});
