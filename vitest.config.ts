import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    reporters: ["default"],
  },
});
