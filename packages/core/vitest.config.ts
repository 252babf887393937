import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pledge/core",
    globals: true,
    environment: "node",
    // Config tests change the working directory, which worker threads do not allow
    pool: "forks",
  },
});
