import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/**/*.test.ts", "engine/**/*.test.ts"],
    environment: "node",
    env: {
      SCHEDULER_LOG_LEVEL: "silent",
    },
  },
});
