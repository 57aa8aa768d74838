import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@atomic-image-manager/executor": fileURLToPath(
        new URL("./executor/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["executor/test/**/*.test.ts", "control-plane/test/**/*.test.ts"],
    environment: "node",
  },
});
