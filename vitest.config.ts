import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    include: ["*.test.ts", "src/**/*.test.ts", "src/**/*.test.tsx"],
  },
});
