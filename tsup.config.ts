import { defineConfig } from "tsup";

export default defineConfig({
  clean: true,
  entry: { index: "src/index.ts" },
  outDir: "dist",
  platform: "node",
  esbuildOptions(options) {
    options.banner = { js: "#!/usr/bin/env node" };
  },
  format: ["esm"],
  minify: true,
  sourcemap: true,
  target: "node20",
});
