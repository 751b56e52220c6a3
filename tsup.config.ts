import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts', 'src/tags/index.ts', 'src/coerce/index.ts', 'src/schema/index.ts'],
  format: ['esm'],
  dts: {
    resolve: true,
    compilerOptions: {
      composite: false,
      noEmit: false
    }
  },
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  minify: false,
  external: ['zod'],
  outDir: 'dist',
  target: 'node20'
})
