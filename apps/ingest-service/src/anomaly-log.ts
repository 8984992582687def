import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs'
import { dirname } from 'node:path'
import type { AnomalyLogEntry } from '@trip-insights/trip-common'

/**
 * Append-only destination for anomaly entries. `append` must not block.
 */
export interface AnomalySink {
  append: (entry: AnomalyLogEntry) => void
}

/**
 * Formats one entry as a log line: `[TAG] <message> (batch <n>)`.
 */
export const formatAnomalyLine = (entry: AnomalyLogEntry): string =>
  `[${entry.tag}] ${entry.message} (batch ${entry.batch})`

/**
 * Anomaly log backed by a text file. The file (and its directory) is only
 * created when the first entry arrives, so a clean run leaves nothing behind.
 */
export class FileAnomalyLog implements AnomalySink {
  private stream: WriteStream | null = null
  private streamError: Error | null = null
  private written = 0

  constructor(public readonly path: string) {}

  append(entry: AnomalyLogEntry): void {
    const stream = this.stream ?? this.openStream()
    stream.write(`${formatAnomalyLine(entry)}\n`)
    this.written += 1
  }

  /** Entries appended since construction. */
  get entryCount(): number {
    return this.written
  }

  /**
   * Flushes and closes the file.
   * @throws When the file could not be written.
   */
  async close(): Promise<void> {
    const stream = this.stream
    if (stream) {
      this.stream = null
      await new Promise<void>((resolve, reject) => {
        if (this.streamError) {
          stream.destroy()
          reject(this.streamError)
          return
        }
        stream.once('error', reject)
        stream.end(() => resolve())
      })
    }
    if (this.streamError) {
      throw this.streamError
    }
  }

  private openStream(): WriteStream {
    mkdirSync(dirname(this.path), { recursive: true })
    const stream = createWriteStream(this.path, { flags: 'a', encoding: 'utf8' })
    stream.on('error', (error: NodeJS.ErrnoException) => {
      this.streamError = error
    })
    this.stream = stream
    return stream
  }
}

/**
 * Keeps entries in memory.
 */
export class MemoryAnomalyLog implements AnomalySink {
  readonly entries: AnomalyLogEntry[] = []

  append(entry: AnomalyLogEntry): void {
    this.entries.push(entry)
  }

  lines(): string[] {
    return this.entries.map(formatAnomalyLine)
  }
}
