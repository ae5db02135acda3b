import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/tools/**/*.test.ts"],
    environment: "node",
  },
});
