import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smartnumber/core",
    globals: true,
    environment: "node",
  },
});
