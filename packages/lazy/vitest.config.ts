import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pledge/lazy",
    globals: true,
    environment: "node",
  },
});
