/**
 * A trip row as read from the raw source, before any validation.
 * Fields that were empty or unparseable in the source are null.
 */
export interface RawTripRecord {
  id: string
  vendor_id: string | null
  pickup_datetime: string | null
  dropoff_datetime: string | null
  passenger_count: number | null
  pickup_longitude: number | null
  pickup_latitude: number | null
  dropoff_longitude: number | null
  dropoff_latitude: number | null
  store_and_fwd_flag: string | null
  trip_duration: number | null
}

/** Raw source columns, in file order. */
export const RAW_TRIP_COLUMNS: ReadonlyArray<keyof RawTripRecord> = [
  'id',
  'vendor_id',
  'pickup_datetime',
  'dropoff_datetime',
  'passenger_count',
  'pickup_longitude',
  'pickup_latitude',
  'dropoff_longitude',
  'dropoff_latitude',
  'store_and_fwd_flag',
  'trip_duration',
] as const

export type DurationCategory = 'short' | 'medium' | 'long'

export const DURATION_CATEGORIES: readonly DurationCategory[] = ['short', 'medium', 'long'] as const

export type RushHourFlag = 0 | 1

/**
 * A validated trip with derived geometric and temporal features.
 * Written once to the store and never mutated afterwards.
 */
export interface EnrichedTripRecord extends RawTripRecord {
  pickup_datetime: string
  dropoff_datetime: string
  pickup_longitude: number
  pickup_latitude: number
  dropoff_longitude: number
  dropoff_latitude: number
  trip_duration: number
  trip_distance_km: number
  trip_speed_kmh: number | null
  duration_category: DurationCategory
  rush_hour_flag: RushHourFlag
}

export type AnomalyTag = 'TIME' | 'ANOMALY'

/**
 * One line of the anomaly side channel, emitted at most once per tag per batch.
 */
export interface AnomalyLogEntry {
  tag: AnomalyTag
  count: number
  batch: number
  message: string
}

export interface HourCount {
  hour: number
  count: number
}

export interface BusiestHour {
  hour: number
  trips: number
}

export interface CategoryCount {
  category: string
  count: number
}

export interface HistogramBin {
  label: string
  count: number
}

/**
 * Inclusive date bounds (YYYY-MM-DD) on the date part of pickup_datetime.
 * A missing bound leaves that side open.
 */
export interface TripFilter {
  start?: string
  end?: string
}

export interface DistributionFilter extends TripFilter {
  rush?: RushHourFlag
  minPassengers?: number
  maxPassengers?: number
}

export interface TripSummary {
  trips: number
  avg_duration_s: number
  avg_km: number
  avg_kmh: number
}

/**
 * Raw aggregate row; averages are null when no trip matched.
 */
export interface TripSummaryRow {
  trips: number
  avgDurationS: number | null
  avgKm: number | null
  avgKmh: number | null
}

/**
 * Write side of the store used by ingestion.
 */
export interface TripWriter {
  /**
   * Inserts records whose id is not yet present; existing ids are left untouched.
   * @returns Number of rows newly inserted.
   */
  persist: (records: readonly EnrichedTripRecord[]) => Promise<number>
}

/**
 * Read-only queries consumed by the aggregation engine.
 */
export interface TripQuerySurface {
  summarize: (filter: TripFilter) => Promise<TripSummaryRow>
  /** Trip counts grouped by pickup hour, ascending by hour. */
  countByHour: (filter: TripFilter) => Promise<HourCount[]>
  countByCategory: (filter: DistributionFilter) => Promise<CategoryCount[]>
  speeds: (filter: TripFilter) => Promise<Array<number | null>>
}
