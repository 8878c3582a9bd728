import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent"
    }
  }
});
