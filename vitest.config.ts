import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["domain/**/*.test.ts", "runtime/**/*.test.ts"],
    globals: false,
  },
});
