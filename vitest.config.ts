import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/**/src/**/*.test.ts", "packages/**/src/**/*.test.ts"],
    globals: false,
    environment: "node",
    testTimeout: 20000,
    hookTimeout: 20000,
  },
});
