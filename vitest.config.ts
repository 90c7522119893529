import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: [
        "src/reference-ids.ts",
        "src/session/**/*.ts",
        "src/orchestration/**/*.ts",
      ],
    },
  },
});
