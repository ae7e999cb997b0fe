import { defineConfig } from "tsdown";

export default defineConfig([
  {
    entry: {
      index: "src/index.ts",
      testing: "src/testing.ts",
    },
    format: ["esm", "cjs"],
    dts: true,
    clean: true,
    sourcemap: true,
  },
  {
    entry: {
      "bin/linelog": "src/bin/linelog.ts",
    },
    format: "esm",
    dts: false,
    clean: false,
    sourcemap: true,
  },
]);
