import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/cli/index.ts', 'src/index.ts'],
  format: ['esm'],
  outDir: 'dist',
  dts: false,
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Keep dist/cli/index.js and dist/index.js as stable paths
  splitting: false,
  onSuccess: 'chmod +x dist/cli/index.js',
})
