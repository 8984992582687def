import { RAW_TRIP_COLUMNS, type RawTripRecord } from '@trip-insights/trip-common'
import type { RecordSource } from './record-source'

export interface SourcePreview {
  rows: RawTripRecord[]
  columns: ReadonlyArray<keyof RawTripRecord>
  /** Columns with no value in any previewed row; usually a header mismatch. */
  emptyColumns: Array<keyof RawTripRecord>
}

const hasValue = (value: RawTripRecord[keyof RawTripRecord]): boolean =>
  value !== null && value !== ''

/**
 * Reads the first records of a source without ingesting anything.
 * @param source Raw record source.
 * @param limit Number of records to read.
 */
export const previewSource = async (source: RecordSource, limit: number = 5): Promise<SourcePreview> => {
  const rows: RawTripRecord[] = []
  if (limit > 0) {
    for await (const record of await source.open()) {
      rows.push(record)
      if (rows.length >= limit) {
        break
      }
    }
  }

  const emptyColumns = RAW_TRIP_COLUMNS.filter((column) => !rows.some((row) => hasValue(row[column])))
  return { rows, columns: RAW_TRIP_COLUMNS, emptyColumns }
}

/**
 * Renders a preview as pipe-separated text lines for the console.
 */
export const formatPreview = (preview: SourcePreview): string[] => {
  const header = preview.columns.join(' | ')
  const lines = [header, '-'.repeat(header.length)]
  for (const row of preview.rows) {
    lines.push(preview.columns.map((column) => String(row[column] ?? '')).join(' | '))
  }
  lines.push(`Columns available: ${preview.columns.join(', ')}`)
  lines.push(`Rows in sample: ${preview.rows.length}`)
  if (preview.emptyColumns.length > 0 && preview.rows.length > 0) {
    lines.push(`Columns with no values: ${preview.emptyColumns.join(', ')}`)
  }
  return lines
}
