import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@practice/core": fileURLToPath(
        new URL("./packages/core/src/index.ts", import.meta.url)
      ),
      "@practice/data": fileURLToPath(
        new URL("./packages/data/src/index.ts", import.meta.url)
      )
    }
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node"
  }
});
