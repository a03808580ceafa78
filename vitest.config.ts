import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
    env: {
      ITINERA_LOG_LEVEL: "fatal",
      ITINERA_LOG_FORMAT: "hidden"
    }
  }
});
