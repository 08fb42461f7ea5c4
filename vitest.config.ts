import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    include: ["tests/**/*.test.ts"],

    // Coverage configuration
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html", "lcov"],
      exclude: [
        "node_modules/**",
        "tests/**",
        "**/*.test.ts",
        "**/types/**",
        "vitest.config.ts",
        "src/**/index.ts",
      ],
      include: ["src/**/*.ts"],
    },

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Retry failed tests
    retry: 0,

    // Mock options
    clearMocks: true,
  },
});
