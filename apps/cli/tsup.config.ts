import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  // Add shebang for CLI executable
  banner: {
    js: "#!/usr/bin/env node",
  },
  // Workspace packages export TypeScript sources, so they are bundled
  skipNodeModulesBundle: true,
  noExternal: [/^@nstack\/.*/],
});
