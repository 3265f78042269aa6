import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/random/index.ts',
    'src/rotation/index.ts',
    'src/point/index.ts',
    'src/cube/index.ts',
    'src/solver/index.ts',
    'src/notation/index.ts',
    'src/render/index.ts',
  ],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: true,
  target: 'es2022',
});
