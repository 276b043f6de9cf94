import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";

/**
 * Vite config for producing a single-file IIFE bundle.
 * The bundle exposes `window.TokenGrid` (or `globalThis.TokenGrid`).
 *
 * Usage:
 *   npx vite build --config vite.bundle.config.ts
 */
export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/bundle-entry.ts", import.meta.url)),
      name: "TokenGrid",
      formats: ["iife", "es"],
      fileName: (format) => `tokengrid.${format === "es" ? "esm" : "iife"}.js`,
    },
    outDir: "dist/bundle",
    emptyOutDir: true,
    minify: true,
  },
});
