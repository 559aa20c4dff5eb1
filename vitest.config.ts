import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["studyforge-main/tests/**/*.test.ts"],
    environment: "node",
    env: {
      STUDYFORGE_LOG_LEVEL: "silent",
    },
  },
});
