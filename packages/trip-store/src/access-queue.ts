/**
 * Serializes store operations so that exactly one runs at a time, in call order.
 * Ingestion writes and aggregation reads share one queue per store.
 */
export class AccessQueue {
  private tail: Promise<void> = Promise.resolve()

  /**
   * Runs an operation after every previously queued operation has settled.
   * @param operation Work to run exclusively.
   * @returns The operation's result; a failure rejects this call only.
   */
  public run<T>(operation: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(operation)
    // the chain keeps going after a failed operation; the caller still sees the rejection
    this.tail = result.then(
      () => undefined,
      () => undefined
    )
    return result
  }
}
