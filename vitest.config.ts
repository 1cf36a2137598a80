import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@weft/compiler": resolve(packagesRoot, "compiler/src/index.ts"),
    },
  },
  test: {
    include: ["{packages,apps}/*/src/**/__tests__/**/*.test.ts"],
    pool: "threads",
    hookTimeout: 30000,
  },
});
