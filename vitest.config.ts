import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function packageSource(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@blobvault/blobstore-mem": packageSource("blobstore-mem"),
      "@blobvault/blobstore-tests": packageSource("blobstore-tests"),
      "@blobvault/blobstore": packageSource("blobstore"),
      "@blobvault/utils-node": packageSource("utils-node"),
      "@blobvault/utils": packageSource("utils"),
    },
  },
});
