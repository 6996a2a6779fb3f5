import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["vm-recovery/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 30_000,
  },
});
