import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    environment: "node",
    env: { NODE_ENV: "test" },
    include: ["tests/**/*.{test,spec}.ts"],
    coverage: {
      provider: "v8" as const,
      reporter: ["text", "lcov"],
      include: ["src/**"],
      exclude: ["**/*.d.ts", "src/index.ts"],
    },
  },
});
