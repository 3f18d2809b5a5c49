// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/shared/test/**/*.spec.ts",
      "backend/services/item/test/**/*.spec.ts",
    ],
    env: { LOG_LEVEL: "silent" },
    testTimeout: 10_000,
  },
});
