import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 20_000,
    hookTimeout: 20_000,
    pool: "forks",
    include: ["src/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    unstubEnvs: true,
  },
});
