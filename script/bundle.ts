import * as esbuild from "esbuild";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL("..", import.meta.url));

/** Bundle the browser entry point into one minified script */
export const bundle = (outfile = "dist/public/dashboard.js") =>
  esbuild.build({
    absWorkingDir: root,
    entryPoints: ["app/main.ts"],
    outfile,
    bundle: true,
    minify: true,
    sourcemap: false,
    format: "iife",
    charset: "utf8",
    target: "es2020",
    platform: "browser",
  });

const result = await bundle();
for (const warning of result.warnings) console.warn(warning.text);
console.info("Bundled app/main.ts");
