/**
 * Vitest configuration for @vision-assistant/server
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    env: {
      LOG_LEVEL: "silent",
    },
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: ["node_modules/", "dist/", "**/*.test.ts", "tests/helpers/"],
    },
    exclude: ["node_modules", "dist"],
  },
});
