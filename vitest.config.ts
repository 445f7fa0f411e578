import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_TO_FILE: "false",
      LOG_LEVEL: "error",
    },
  },
});
