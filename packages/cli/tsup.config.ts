import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  target: "node20",
  clean: true,
  // The engine is consumed from source, so it is bundled into the binary.
  noExternal: ["@pwgauge/engine"],
  banner: {
    js: [
      "import{createRequire as __cjs_createRequire}from'module';",
      "const require=__cjs_createRequire(import.meta.url);",
    ].join(""),
  },
});
