import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
    // Encoding real images and spawning the CLI through tsx both take a while
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
