import { defineConfig } from "rolldown";

export default defineConfig([
  // ESM bundle (single file)
  {
    input: "src/index.ts",
    output: {
      file: "dist/pulso.esm.js",
      format: "esm",
      sourcemap: true,
    },
  },
  // IIFE bundle (for script tags), exposes `Pulso`
  {
    input: "src/index.ts",
    output: {
      file: "dist/pulso.iife.js",
      format: "iife",
      name: "Pulso",
      sourcemap: true,
    },
  },
  {
    input: "src/index.ts",
    output: {
      file: "dist/pulso.iife.min.js",
      format: "iife",
      name: "Pulso",
      sourcemap: true,
      minify: true,
    },
  },
]);
