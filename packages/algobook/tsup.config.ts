import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/errors/index.ts',
    'src/graph/index.ts',
    'src/dfs/index.ts',
    'src/flow/index.ts',
    'src/matching/index.ts',
    'src/paths/index.ts',
    'src/strings/index.ts',
    'src/numeric/index.ts',
    'src/fenwick/index.ts',
  ],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: true,
  target: 'es2022',
});
