import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyloop/traversal",
    globals: true,
    environment: "node",
  },
});
