/**
 * Vitest configuration for @vision-assistant/shared
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    env: {
      LOG_LEVEL: "silent",
    },
    include: ["src/**/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
  },
});
