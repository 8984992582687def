import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(
  new Set([
    ...builtins,
    'date-fns',
    'js-yaml',
    'papaparse',
    'picocolors',
    'zod',
  ])
)

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/trip-generator.ts',
      formats: ['es'],
      fileName: 'trip-generator',
    },
    rollupOptions: {
      external: externals,
    },
  },
})
