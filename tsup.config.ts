import { defineConfig } from 'tsup'

export default defineConfig([
  {
    entry: { server: 'packages/flowline-backend/src/server.ts', index: 'packages/flowline-backend/src/index.ts' },
    format: ['cjs'],
    dts: false,
    sourcemap: true,
    clean: true,
    platform: 'node',
    target: 'node20',
  },
])
