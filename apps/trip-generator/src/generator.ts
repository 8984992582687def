import { createWriteStream, mkdirSync } from 'node:fs'
import { once } from 'node:events'
import { dirname } from 'node:path'
import type { Writable } from 'node:stream'
import { addSeconds, format } from 'date-fns'
import Papa from 'papaparse'
import { RAW_TRIP_COLUMNS, type RawTripRecord } from '@trip-insights/trip-common'

/**
 * Defects planted on purpose so that every validation path sees rows.
 */
export type DefectKind =
  | 'missing_coordinate'
  | 'out_of_bounds'
  | 'inverted_time'
  | 'non_positive_duration'
  | 'duplicate_id'

export const DEFECT_KINDS: readonly DefectKind[] = [
  'missing_coordinate',
  'out_of_bounds',
  'inverted_time',
  'non_positive_duration',
  'duplicate_id',
] as const

/**
 * Configuration for generating a raw trip CSV.
 */
export interface GeneratorConfig {
  tripCount: number
  outputFile: string
  seed?: number
  /** Share of rows (0..1) that carry a defect. */
  defectRate?: number
  /** First pickup day (local midnight). */
  startDate?: Date
  /** Number of days pickups are spread over. */
  days?: number
}

export interface GenerationSummary {
  rows: number
  defects: Record<DefectKind, number>
}

export const DEFAULT_START_DATE = new Date(2016, 0, 1)
const DEFAULT_DEFECT_RATE = 0.05
const DEFAULT_DAYS = 7
const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss'

// Pickups and dropoffs land in this box, well inside the accepted service area.
const CITY_BOX = { minLat: 40.7, maxLat: 40.85, minLon: -74.02, maxLon: -73.9 }

const createRng = (seed?: number): (() => number) => {
  if (seed == null) {
    return () => Math.random()
  }
  let value = seed >>> 0
  return () => {
    value |= 0
    value = (value + 0x6d2b79f5) | 0
    let t = Math.imul(value ^ (value >>> 15), 1 | value)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

const between = (rng: () => number, min: number, max: number): number => min + rng() * (max - min)

const integerBetween = (rng: () => number, min: number, max: number): number =>
  min + Math.floor(rng() * (max - min + 1))

const roundCoordinate = (value: number): number => Math.round(value * 1e6) / 1e6

const toTripId = (index: number): string => `id${index.toString().padStart(7, '0')}`

const validateConfig = (config: GeneratorConfig): void => {
  if (!Number.isInteger(config.tripCount) || config.tripCount <= 0) {
    throw new Error('tripCount must be a positive integer')
  }
  if (config.outputFile.trim().length === 0) {
    throw new Error('outputFile must be provided')
  }
  const defectRate = config.defectRate ?? DEFAULT_DEFECT_RATE
  if (!(defectRate >= 0 && defectRate <= 1)) {
    throw new Error('defectRate must be between 0 and 1')
  }
  const days = config.days ?? DEFAULT_DAYS
  if (!Number.isInteger(days) || days <= 0) {
    throw new Error('days must be a positive integer')
  }
}

const buildTrip = (index: number, start: Date, days: number, rng: () => number): RawTripRecord => {
  const pickup = addSeconds(start, Math.floor(rng() * days * 86_400))
  const duration = integerBetween(rng, 60, 3600)
  return {
    id: toTripId(index),
    vendor_id: String(integerBetween(rng, 1, 2)),
    pickup_datetime: format(pickup, TIMESTAMP_FORMAT),
    dropoff_datetime: format(addSeconds(pickup, duration), TIMESTAMP_FORMAT),
    passenger_count: integerBetween(rng, 1, 6),
    pickup_longitude: roundCoordinate(between(rng, CITY_BOX.minLon, CITY_BOX.maxLon)),
    pickup_latitude: roundCoordinate(between(rng, CITY_BOX.minLat, CITY_BOX.maxLat)),
    dropoff_longitude: roundCoordinate(between(rng, CITY_BOX.minLon, CITY_BOX.maxLon)),
    dropoff_latitude: roundCoordinate(between(rng, CITY_BOX.minLat, CITY_BOX.maxLat)),
    store_and_fwd_flag: rng() < 0.01 ? 'Y' : 'N',
    trip_duration: duration,
  }
}

const applyDefect = (
  trip: RawTripRecord,
  defect: DefectKind,
  previousId: string | null
): RawTripRecord => {
  switch (defect) {
    case 'missing_coordinate':
      return { ...trip, dropoff_latitude: null }
    case 'out_of_bounds':
      return { ...trip, pickup_latitude: 39.5 }
    case 'inverted_time':
      return { ...trip, pickup_datetime: trip.dropoff_datetime, dropoff_datetime: trip.pickup_datetime }
    case 'non_positive_duration':
      return { ...trip, trip_duration: 0 }
    case 'duplicate_id':
      return previousId === null ? trip : { ...trip, id: previousId }
  }
}

const toCsvLine = (trip: RawTripRecord): string =>
  `${Papa.unparse([RAW_TRIP_COLUMNS.map((column) => trip[column])], { newline: '\n' })}\n`

const writeLine = async (stream: Writable, line: string): Promise<void> => {
  if (!stream.write(line)) {
    await once(stream, 'drain')
  }
}

/**
 * Generates a CSV file of synthetic raw trips. The same seed and start date
 * produce the same file.
 * @param config Configuration controlling the generated output.
 * @returns Row and defect counts.
 */
export const generateTrips = async (config: GeneratorConfig): Promise<GenerationSummary> => {
  validateConfig(config)

  const rng = createRng(config.seed)
  const defectRate = config.defectRate ?? DEFAULT_DEFECT_RATE
  const start = config.startDate ?? DEFAULT_START_DATE
  const days = config.days ?? DEFAULT_DAYS
  const defects: Record<DefectKind, number> = {
    missing_coordinate: 0,
    out_of_bounds: 0,
    inverted_time: 0,
    non_positive_duration: 0,
    duplicate_id: 0,
  }

  mkdirSync(dirname(config.outputFile), { recursive: true })
  const stream = createWriteStream(config.outputFile, { encoding: 'utf8' })
  const finished = new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (error: NodeJS.ErrnoException) => reject(error))
  })

  await writeLine(stream, `${RAW_TRIP_COLUMNS.join(',')}\n`)

  let previousId: string | null = null
  for (let i = 0; i < config.tripCount; i += 1) {
    let trip = buildTrip(i, start, days, rng)
    if (rng() < defectRate) {
      const defect = DEFECT_KINDS[Math.floor(rng() * DEFECT_KINDS.length)]
      const kind: DefectKind = defect === 'duplicate_id' && previousId === null ? 'missing_coordinate' : defect
      trip = applyDefect(trip, kind, previousId)
      defects[kind] += 1
    }
    previousId = trip.id
    await writeLine(stream, toCsvLine(trip))
  }

  stream.end()
  await finished

  return { rows: config.tripCount, defects }
}
