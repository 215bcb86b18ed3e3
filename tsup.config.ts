import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'qchat-bridge': 'src/cli/index.ts'
  },
  outDir: 'dist',
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  splitting: false,
  banner: {
    js: '#!/usr/bin/env node'
  }
});
