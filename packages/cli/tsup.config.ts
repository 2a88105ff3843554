import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  sourcemap: true,
  banner: {
    js: "#!/usr/bin/env node",
  },
  // Workspace packages export their TypeScript sources, which Node cannot
  // load from the built bin. Bundle them in.
  noExternal: ["@paykit/core", "@paykit/pubky"],
  external: ["@synonymdev/pubky", "commander", "chalk", "dotenv", "zod"],
});
