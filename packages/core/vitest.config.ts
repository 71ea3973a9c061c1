import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyloop/core",
    globals: true,
    environment: "node",
  },
});
