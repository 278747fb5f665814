import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@dockyard/resolver": source("resolver"),
      "@dockyard/host": source("host"),
      "@dockyard/cli": source("cli"),
    },
    preserveSymlinks: true,
  },
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    globals: true,
  },
});
