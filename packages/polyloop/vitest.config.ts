import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "polyloop",
    globals: true,
    environment: "node",
  },
});
