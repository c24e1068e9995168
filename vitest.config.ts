import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Process entrypoint: only wires argv and exit code into runCli()
        "src/cli/main.ts",
        // Barrel re-export file
        "src/index.ts",
      ],
    },
  },
});
