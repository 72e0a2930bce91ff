import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    cli: "src/cli.ts",
  },
  target: "node20",
  format: ["esm"],
  splitting: false,
  sourcemap: true,
  clean: true,
  dts: true,
  outDir: "dist",
  banner: {
    js: "#!/usr/bin/env node\n",
  },
  treeshake: true,
});
