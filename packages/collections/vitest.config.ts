import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setkit/collections",
    globals: true,
    environment: "node",
  },
});
