import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["now-playing/src/**/*.test.ts"],
    environment: "node",
  },
});
