const SQLITE_PREFIX = 'sqlite:///'

export const DEFAULT_DATABASE_URL = `${SQLITE_PREFIX}data/db/nyc.db`

/**
 * Resolves a database URL to a SQLite file path.
 * Accepts `sqlite:///<path>`, `:memory:` or a plain file path.
 * @throws When the URL names a scheme other than sqlite.
 */
export const resolveDatabasePath = (url: string): string => {
  const trimmed = url.trim()
  if (trimmed.startsWith(SQLITE_PREFIX)) {
    const path = trimmed.slice(SQLITE_PREFIX.length)
    if (path.length === 0) {
      throw new Error(`Database URL has no file path: ${url}`)
    }
    return path
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new Error(`Unsupported database URL: ${url}`)
  }
  if (trimmed.length === 0) {
    throw new Error('Database URL must not be empty')
  }
  return trimmed
}
