import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Umbrella package tests
      {
        test: {
          name: "smartnumber",
          include: ["tests/**/*.test.ts"],
          globals: true,
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    testTimeout: 30000,
  },
});
