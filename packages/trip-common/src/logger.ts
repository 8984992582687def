/* eslint-disable no-console */
import pc from 'picocolors'

export interface Logger {
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string, error?: unknown) => void
}

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Creates a console logger that prefixes every line with a colored scope tag.
 * @param scope Short component name, e.g. "ingest".
 */
export const createLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`
  return {
    info: (message) => console.log(`${pc.cyan(prefix)} ${message}`),
    warn: (message) => console.warn(`${pc.yellow(prefix)} ${message}`),
    error: (message, error) => {
      const detail = error === undefined ? '' : `: ${describeError(error)}`
      console.error(`${pc.red(prefix)} ${message}${detail}`)
    },
  }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
}
