import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(
  new Set([
    ...builtins,
    'better-sqlite3',
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
      entry: 'src/ingest-service.ts',
      formats: ['es'],
      fileName: 'ingest-service',
    },
    rollupOptions: {
      external: externals,
    },
  },
})
