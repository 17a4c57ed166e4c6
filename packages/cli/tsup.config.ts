import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false,
  treeshake: true,
  target: 'node20',
  // workspace-пакеты экспортируют исходники .ts, поэтому вшиваем их в бандл
  noExternal: [/^@netrules\//],
  external: [
    'ajv',
    'ajv-formats',
    'commander',
    'colorette',
    'dotenv',
    'picomatch',
    'yaml',
  ],
  banner: {
    js: '#!/usr/bin/env node',
  },
})
