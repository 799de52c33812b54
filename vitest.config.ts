import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.spec.ts"],
  },
  resolve: {
    extensions: [".ts", ".js"],
  },
  esbuild: {
    target: "ES2022",
  },
});
