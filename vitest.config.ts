import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Resolve the shared package to its source so vitest can follow its deps
      "@weekly-digest/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    server: {
      deps: {
        inline: [/^@weekly-digest\//],
      },
    },
  },
});
