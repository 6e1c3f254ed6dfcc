import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setkit/core",
    globals: true,
    environment: "node",
  },
});
