import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'es2022',
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  dts: true,
  skipNodeModulesBundle: true,
  external: [/^@studyhall\/.*/],
});
