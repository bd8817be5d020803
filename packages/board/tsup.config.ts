import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/server.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources; bundle them into the server.
  noExternal: ["@plainboard/core", "@plainboard/sync"],
});
