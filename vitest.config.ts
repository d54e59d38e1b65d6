import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@paircast/utils": packageSource("utils"),
      "@paircast/transport": packageSource("transport"),
      "@paircast/session": packageSource("session"),
      "@paircast/monitor": packageSource("monitor"),
      "@paircast/media-webrtc": packageSource("media-webrtc"),
    },
  },
});
