import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['esm', 'cjs'],
  dts: true,
  sourcemap: true,
  shims: true,
  clean: true,
  splitting: false,
  minify: false,
  platform: 'node',
  target: 'node20',
});
