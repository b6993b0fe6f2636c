import { defineConfig } from "tsup";

// Workspace packages point `main` at their TypeScript sources, so esbuild
// bundles them straight from src/; third-party packages stay external.
export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  noExternal: [/^@picross\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
