import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(
  new Set([
    ...builtins,
    '@grpc/grpc-js',
    '@grpc/proto-loader',
    'better-sqlite3',
    'date-fns',
    'js-yaml',
    'picocolors',
    'zod',
  ])
)

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/analytics-service.ts',
      formats: ['es'],
      fileName: 'analytics-service',
    },
    rollupOptions: {
      external: externals,
    },
  },
})
