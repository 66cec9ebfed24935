import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@optikit/university",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
