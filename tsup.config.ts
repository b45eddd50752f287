import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'bin/switchboard.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  outDir: 'dist',
});
