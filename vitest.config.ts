import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["labctl/test/**/*.test.ts"],
    env: {
      LABCTL_LOG_LEVEL: "silent",
    },
  },
});
