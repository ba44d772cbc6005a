import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's own esbuild step forces keepNames off, which renames function
  // expressions that shadow an outer binding (`const greet = defineTool(function greet ...)`)
  // and so changes `fn.name`. Transform TypeScript with keepNames on instead.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        if (!/\.ts$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, { loader: 'ts', target: 'esnext', keepNames: true });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    include: ['test/**/*.test.ts'],
    env: { LOG_LEVEL: 'silent' },
  },
});
