import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@score-history/core": source("core"),
      "@score-history/store-kv": source("store-kv"),
      "@score-history/store-mem": source("store-mem"),
      "@score-history/store-sql": source("store-sql"),
      "@score-history/testing": source("testing"),
      "@score-history/utils": source("utils"),
    },
  },
});
