import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tpack/test/**/*.test.ts"],
    environment: "node",
  },
});
