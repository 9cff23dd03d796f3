import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    include: ["**/__tests__/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
  },
});
