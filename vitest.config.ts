import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    // Tests replace console.* and env vars; keep them scoped to the test.
    unstubEnvs: true,
    unstubGlobals: true,
    pool: "forks",
  },
});
