import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@decidable/eqtype",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
