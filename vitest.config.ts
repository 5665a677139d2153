import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    env: {
      THEME_BUILDER_LOG_LEVEL: "silent",
    },
  },
});
