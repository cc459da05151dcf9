import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Barrel re-export files (no logic, just re-exports)
        "src/index.ts",
        "src/caddy/index.ts",
        "src/proxy-route/index.ts",
        // In-process test doubles
        "src/test/**",
      ],
    },
  },
});
