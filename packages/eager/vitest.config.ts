import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pledge/eager",
    globals: true,
    environment: "node",
  },
});
