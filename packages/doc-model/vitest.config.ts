import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@docweave/doc-model",
    environment: "node",
    include: [
      "tests/unit/**/*.test.ts",
      "tests/steps/**/*.steps.ts", // Gherkin step files
    ],
  },
});
