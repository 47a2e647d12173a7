// vitest.config.ts
import { transform } from "esbuild";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // Vite's built-in esbuild step forces `keepNames: false`, which lets esbuild
  // rename `function openHome` to `openHome2` beside a same-named `const`.
  // action() registers under `fn.name`, so transpile TypeScript with names kept.
  esbuild: false,
  plugins: [
    {
      name: "ts-keep-names",
      async transform(code, id) {
        if (!/\.ts$/.test(id.split("?")[0] ?? id)) return null;
        const result = await transform(code, {
          loader: "ts",
          format: "esm",
          target: "es2022",
          keepNames: true,
          sourcemap: true,
          sourcefile: id,
        });
        return { code: result.code, map: result.map };
      },
    },
  ],
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      FORCE_COLOR: "0",
    },
    testTimeout: 20_000,
  },
});
