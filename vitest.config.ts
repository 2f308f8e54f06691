import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["bionic/**/*.test.ts", "*.test.ts"],
    environment: "node",
  },
});
