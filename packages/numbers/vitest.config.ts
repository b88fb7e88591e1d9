import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smartnumber/numbers",
    globals: true,
    environment: "node",
  },
});
