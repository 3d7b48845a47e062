import { defineConfig } from "vitest/config";

const verbose = process.env.VITEST_VERBOSE === "true";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["src/tests/**/*.test.ts"],
    silent: !verbose,
  },
});
