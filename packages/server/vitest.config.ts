import { fileURLToPath } from "node:url";
import { defineProject } from "vitest/config";

export default defineProject({
  resolve: {
    alias: {
      // Run against the store's sources so tests need no build first
      "@contactbook/store": fileURLToPath(new URL("../store/src/index.ts", import.meta.url)),
    },
  },
  test: {
    name: "server",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
