import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

/** Resolve a workspace package to its TypeScript entry point */
function pkg(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@devpeace/shared": pkg("shared"),
      "@devpeace/core": pkg("core"),
      "@devpeace/daemon": pkg("daemon"),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
