import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "apps/*/src/**/*.{test,spec}.ts",
      "apps/*/src/**/__tests__/**/*.{test,spec}.ts",
    ],
    environment: "node",
    globals: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      include: ["apps/*/src/**/*.ts"],
      exclude: ["apps/*/src/**/__tests__/**", "apps/*/src/main/main.ts"],
    },
    reporters: process.env.CI ? ["default", "junit"] : ["default"],
    outputFile: process.env.CI ? { junit: "coverage/junit.xml" } : undefined,
  },
});
