/**
 * Runs every closer in order, even when an earlier one fails.
 * @param closers Functions releasing one resource each.
 * @throws The single failure, or an AggregateError when several closers failed.
 */
export const closeAll = async (closers: ReadonlyArray<() => Promise<void>>): Promise<void> => {
  const errors: unknown[] = []
  for (const close of closers) {
    try {
      await close()
    } catch (error) {
      errors.push(error)
    }
  }
  if (errors.length === 1) {
    throw errors[0]
  }
  if (errors.length > 1) {
    throw new AggregateError(errors, `${errors.length} resources failed to close`)
  }
}
