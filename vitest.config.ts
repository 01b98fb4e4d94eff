import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    env: { HEPC_LOG_LEVEL: "silent" },
    include: ["tests/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
