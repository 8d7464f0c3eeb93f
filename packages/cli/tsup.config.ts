import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  // Bundle the workspace engine; keep registry packages external.
  noExternal: ["@probekit/engine"],
});
