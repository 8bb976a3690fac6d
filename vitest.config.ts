import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@can-timing/shared": path.resolve(__dirname, "packages/shared/src"),
      "@can-timing/bit-timing": path.resolve(__dirname, "packages/bit-timing/src"),
    },
  },
});
