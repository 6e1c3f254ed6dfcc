import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setkit/std",
    globals: true,
    environment: "node",
  },
});
