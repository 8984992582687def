import { constants, createReadStream } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import { extname } from 'node:path'
import { createInterface } from 'node:readline'
import Papa from 'papaparse'
import type { RawTripRecord } from '@trip-insights/trip-common'

/**
 * Raised when the raw source is missing or unreadable. This is the only
 * condition that aborts an ingestion run.
 */
export class SourceUnavailableError extends Error {
  constructor(
    public readonly location: string,
    cause?: unknown
  ) {
    super(`Raw trip source not found or unreadable: ${location}`, { cause })
    this.name = 'SourceUnavailableError'
  }
}

/**
 * A stream of raw trip records. `open` fails fast with SourceUnavailableError
 * before any record is produced.
 */
export interface RecordSource {
  readonly description: string
  open: () => Promise<AsyncIterable<RawTripRecord>>
}

export type SourceFormat = 'csv' | 'ndjson'

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null
}

const readText = (value: unknown): string | null => {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed.length > 0 ? trimmed : null
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  return null
}

const readNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  const text = readText(value)
  if (text === null) {
    return null
  }
  const parsed = Number(text)
  return Number.isFinite(parsed) ? parsed : null
}

const readInteger = (value: unknown): number | null => {
  const parsed = readNumber(value)
  return parsed === null ? null : Math.trunc(parsed)
}

/**
 * Maps an untyped source row onto a RawTripRecord.
 * Blank or unparseable cells become null; a missing id becomes an empty string.
 * @param row Parsed CSV row or JSON object.
 */
export const toRawTripRecord = (row: unknown): RawTripRecord => {
  const fields: Record<string, unknown> = isRecord(row) ? row : {}
  return {
    id: readText(fields.id) ?? '',
    vendor_id: readText(fields.vendor_id),
    pickup_datetime: readText(fields.pickup_datetime),
    dropoff_datetime: readText(fields.dropoff_datetime),
    passenger_count: readInteger(fields.passenger_count),
    pickup_longitude: readNumber(fields.pickup_longitude),
    pickup_latitude: readNumber(fields.pickup_latitude),
    dropoff_longitude: readNumber(fields.dropoff_longitude),
    dropoff_latitude: readNumber(fields.dropoff_latitude),
    store_and_fwd_flag: readText(fields.store_and_fwd_flag),
    trip_duration: readInteger(fields.trip_duration),
  }
}

/**
 * Picks the reader from the file extension.
 * @throws When the extension is neither CSV nor NDJSON.
 */
export const detectSourceFormat = (path: string): SourceFormat => {
  const extension = extname(path).toLowerCase()
  if (extension === '.csv') {
    return 'csv'
  }
  if (extension === '.ndjson' || extension === '.jsonl') {
    return 'ndjson'
  }
  throw new Error(`Unsupported raw source format "${extension}" for ${path}`)
}

async function* readCsvRows(path: string): AsyncGenerator<unknown> {
  const input = createReadStream(path)
  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
    header: true,
    skipEmptyLines: 'greedy',
  })
  input.on('error', (error) => parser.destroy(error))
  input.pipe(parser)

  try {
    for await (const row of parser) {
      yield row
    }
  } finally {
    input.destroy()
  }
}

async function* readNdjsonRows(path: string): AsyncGenerator<unknown> {
  const input = createReadStream(path)
  const reader = createInterface({ input, crlfDelay: Infinity })

  try {
    for await (const line of reader) {
      if (line.trim().length === 0) {
        continue
      }
      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        // an unparseable line still counts as a (field-less) record
        parsed = null
      }
      yield parsed
    }
  } finally {
    reader.close()
    input.destroy()
  }
}

async function* mapRows(rows: AsyncIterable<unknown>): AsyncGenerator<RawTripRecord> {
  for await (const row of rows) {
    yield toRawTripRecord(row)
  }
}

const ensureReadableFile = async (path: string): Promise<void> => {
  try {
    await access(path, constants.R_OK)
    const info = await stat(path)
    if (!info.isFile()) {
      throw new Error(`${path} is not a file`)
    }
  } catch (error) {
    throw new SourceUnavailableError(path, error)
  }
}

/**
 * Streams raw trips from a CSV or NDJSON file.
 * @param path File path; the extension selects the reader.
 */
export const createFileRecordSource = (path: string): RecordSource => {
  const format = detectSourceFormat(path)
  return {
    description: `${format} file ${path}`,
    open: async () => {
      await ensureReadableFile(path)
      return mapRows(format === 'csv' ? readCsvRows(path) : readNdjsonRows(path))
    },
  }
}

/**
 * Wraps records that are already in memory.
 */
export const createIterableRecordSource = (
  records: Iterable<RawTripRecord> | AsyncIterable<RawTripRecord>,
  description: string = 'in-memory records'
): RecordSource => ({
  description,
  open: async () => {
    async function* iterate(): AsyncGenerator<RawTripRecord> {
      yield* records
    }
    return iterate()
  },
})
