export * from './types'
export * from './metrics'
export * from './logger'
export * from './config-file'
