import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts', 'src/cli/index.ts'],
  format: ['esm'],
  outDir: 'dist',
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',
  splitting: false,
  // CLI 入口需要可执行权限
  onSuccess: 'chmod +x dist/cli/index.js',
})
