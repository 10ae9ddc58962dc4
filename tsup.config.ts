import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli/index.ts'],
  dts: true,
  sourcemap: true,
  clean: true, // wipe dist before bundling
  format: ['cjs'],
  target: 'node20',
  treeshake: true,
  minify: false,
  outDir: 'dist',
});
