import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Sources import siblings as './x.js' (NodeNext); point Vite at the .ts file
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.endsWith('.js') && importer && !source.includes('node_modules')) {
          const tsPath = source.replace(/\.js$/, '.ts');
          return this.resolve(tsPath, importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    globals: true,
    pool: 'forks',
    // fetch is stubbed per suite; put the real one back between tests
    unstubGlobals: true,
  },
});
