import { transform } from 'esbuild';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's built-in esbuild transform forces keepNames off, and esbuild renames
  // function expressions that shadow their binding (`const add = trace(function add() {})`
  // becomes `function add2`). Transpile TypeScript with keepNames so Function.name
  // matches what tsc emits.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        const file = id.split('?')[0];
        if (!/\.[cm]?tsx?$/.test(file)) return null;
        const result = await transform(code, {
          loader: file.endsWith('x') ? 'tsx' : 'ts',
          target: 'esnext',
          format: 'esm',
          keepNames: true,
          sourcemap: true,
          sourcefile: file,
        });
        return { code: result.code, map: result.map };
      },
    },
  ],
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
  },
});
