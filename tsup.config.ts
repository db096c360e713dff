import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    dts: true,                 // genera .d.ts
    sourcemap: false,
    minify: false,             // es una librería chica: mejor legible
    treeshake: true,
    splitting: false,
    clean: true,               // borra dist
    outDir: "dist",
    target: "es2022"
});
