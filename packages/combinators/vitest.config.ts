import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyloop/combinators",
    globals: true,
    environment: "node",
  },
});
