import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs", "esm"],
  dts: true,
  clean: true,
  sourcemap: true,
  noExternal: ["@paykit/core"],
  // @synonymdev/pubky ships WebAssembly and is imported lazily at runtime.
  // Mark it external so esbuild does not attempt to bundle it.
  external: ["@synonymdev/pubky"],
});
