import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@optikit/optics",
    environment: "node",
  },
});
