import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,
  // The core workspace package is inlined; npm dependencies stay external
  noExternal: ['@colloquy/core'],
  external: [
    'chalk',
    'commander',
    'ink',
    'marked',
    'marked-terminal',
    'react',
    'yaml',
    'zod',
  ],
  esbuildOptions(options) {
    options.jsx = 'automatic';
  },
});
