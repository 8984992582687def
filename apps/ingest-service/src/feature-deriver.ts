import type {
  AnomalyLogEntry,
  DurationCategory,
  EnrichedTripRecord,
  RushHourFlag,
} from '@trip-insights/trip-common'
import type { AnomalySink } from './anomaly-log'
import { haversineKm } from './geo'
import { hoursToMs, parseTimestamp, parseWrittenClockTime, timeOfDayMs } from './timestamps'
import type { CompleteTripRecord } from './validator'

export const SHORT_TRIP_MAX_S = 300
export const MEDIUM_TRIP_MAX_S = 1200
export const MAX_PLAUSIBLE_SPEED_KMH = 120
export const MAX_PLAUSIBLE_DISTANCE_KM = 100

// Inclusive [start, end] windows, in hours since midnight.
const RUSH_WINDOWS: ReadonlyArray<readonly [number, number]> = [
  [7, 9],
  [17, 19],
]

export interface BatchContext {
  /** 1-based batch number within the run. */
  batch: number
}

export interface DerivationResult {
  records: EnrichedTripRecord[]
  /** Records dropped for unparseable or inverted timestamps. */
  timeRejected: number
  /** Records kept but flagged for implausible speed or distance. */
  anomalies: number
}

export const categorizeDuration = (seconds: number): DurationCategory => {
  if (seconds <= SHORT_TRIP_MAX_S) {
    return 'short'
  }
  if (seconds <= MEDIUM_TRIP_MAX_S) {
    return 'medium'
  }
  return 'long'
}

/**
 * @param pickup Pickup carrying the written clock time (see parseWrittenClockTime).
 */
export const rushHourFlag = (pickup: Date): RushHourFlag => {
  const ms = timeOfDayMs(pickup)
  const inRush = RUSH_WINDOWS.some(([start, end]) => ms >= hoursToMs(start) && ms <= hoursToMs(end))
  return inRush ? 1 : 0
}

export const speedKmh = (distanceKm: number, durationS: number): number | null =>
  durationS > 0 ? (distanceKm / durationS) * 3600 : null

const isAnomalous = (record: EnrichedTripRecord): boolean =>
  (record.trip_speed_kmh !== null && record.trip_speed_kmh > MAX_PLAUSIBLE_SPEED_KMH) ||
  record.trip_distance_km > MAX_PLAUSIBLE_DISTANCE_KM

/**
 * Derives distance, speed, duration category and rush-hour flag for validated trips.
 * Records with unusable timestamps are dropped; implausible ones are only logged.
 */
export class FeatureDeriver {
  constructor(private readonly sink: AnomalySink) {}

  /**
   * @param batch Records that passed validation.
   * @param context Batch position, carried into anomaly entries.
   */
  derive(batch: readonly CompleteTripRecord[], context: BatchContext): DerivationResult {
    const records: EnrichedTripRecord[] = []
    let timeRejected = 0

    for (const record of batch) {
      const pickup = parseTimestamp(record.pickup_datetime)
      const dropoff = parseTimestamp(record.dropoff_datetime)
      const pickupClock = parseWrittenClockTime(record.pickup_datetime)
      if (!pickup || !dropoff || !pickupClock || dropoff.getTime() < pickup.getTime()) {
        timeRejected += 1
        continue
      }

      const distance = haversineKm(
        record.pickup_latitude,
        record.pickup_longitude,
        record.dropoff_latitude,
        record.dropoff_longitude
      )

      records.push({
        ...record,
        trip_distance_km: distance,
        trip_speed_kmh: speedKmh(distance, record.trip_duration),
        duration_category: categorizeDuration(record.trip_duration),
        rush_hour_flag: rushHourFlag(pickupClock),
      })
    }

    if (timeRejected > 0) {
      this.emit({
        tag: 'TIME',
        count: timeRejected,
        batch: context.batch,
        message: `Excluding ${timeRejected} rows with invalid/inverted timestamps`,
      })
    }

    const anomalies = records.filter(isAnomalous).length
    if (anomalies > 0) {
      this.emit({
        tag: 'ANOMALY',
        count: anomalies,
        batch: context.batch,
        message: `${anomalies} rows with speed>${MAX_PLAUSIBLE_SPEED_KMH} km/h or distance>${MAX_PLAUSIBLE_DISTANCE_KM} km`,
      })
    }

    return { records, timeRejected, anomalies }
  }

  private emit(entry: AnomalyLogEntry): void {
    this.sink.append(entry)
  }
}
