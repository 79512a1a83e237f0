import { defineConfig } from 'tsup';

export default defineConfig([
  // Library: ESM + CJS with declarations
  {
    entry: { index: 'src/index.ts' },
    format: ['esm', 'cjs'],
    target: 'node20',
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
  },
  // inistore executable
  {
    entry: { cli: 'src/cli.ts' },
    format: ['esm'],
    target: 'node20',
    splitting: false,
    sourcemap: true,
    banner: {
      js: '#!/usr/bin/env node',
    },
    onSuccess: 'chmod +x dist/cli.js',
  },
]);
