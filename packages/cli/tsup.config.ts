import { copyFileSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const here = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

// Read version from package.json at build time
const pkg: { version: string } = JSON.parse(readFileSync(here("./package.json"), "utf-8"));

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  outExtension() {
    return { js: ".mjs" };
  },
  banner: {
    // Provide CJS compatibility for bundled dependencies that use require()
    js: `import { createRequire } from 'module';const require = createRequire(import.meta.url);`,
  },
  async onSuccess() {
    // The bundled config loader looks for the default rules beside dist/index.mjs
    copyFileSync(
      here("../core/src/config/default-config.yml"),
      here("./dist/default-config.yml")
    );
    console.log("Copied default-config.yml to dist/");
  },

  // Bundle the workspace packages into the CLI
  noExternal: ["@tripwire/core", "@tripwire/shared"],

  // fsevents is an optional native dependency of chokidar
  external: ["fsevents", /^node:/],

  esbuildOptions(options) {
    // Inject version from package.json at build time
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(pkg.version),
    };
  },
});
