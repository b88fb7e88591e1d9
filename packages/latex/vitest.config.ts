import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smartnumber/latex",
    globals: true,
    environment: "node",
  },
});
