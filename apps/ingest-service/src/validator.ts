import type { RawTripRecord } from '@trip-insights/trip-common'

/**
 * Inclusive bounding box approximating the service region.
 */
export const SERVICE_AREA_BOUNDS = {
  minLat: 40,
  maxLat: 41,
  minLon: -75,
  maxLon: -72,
} as const

export type RejectReason = 'missing_field' | 'duplicate_id' | 'out_of_bounds' | 'non_positive_duration'

export const REJECT_REASONS: readonly RejectReason[] = [
  'missing_field',
  'duplicate_id',
  'out_of_bounds',
  'non_positive_duration',
] as const

export type RejectCounts = Record<RejectReason, number>

/**
 * A raw record whose essential fields are all present.
 */
export type CompleteTripRecord = RawTripRecord & {
  pickup_datetime: string
  dropoff_datetime: string
  pickup_longitude: number
  pickup_latitude: number
  dropoff_longitude: number
  dropoff_latitude: number
  trip_duration: number
}

export interface ValidationResult {
  valid: CompleteTripRecord[]
  rejected: RejectCounts
}

export const emptyRejectCounts = (): RejectCounts => ({
  missing_field: 0,
  duplicate_id: 0,
  out_of_bounds: 0,
  non_positive_duration: 0,
})

export const isComplete = (record: RawTripRecord): record is CompleteTripRecord =>
  record.pickup_datetime != null &&
  record.dropoff_datetime != null &&
  record.pickup_longitude != null &&
  record.pickup_latitude != null &&
  record.dropoff_longitude != null &&
  record.dropoff_latitude != null &&
  record.trip_duration != null

const inRange = (value: number, min: number, max: number): boolean => value >= min && value <= max

const isInServiceArea = (record: CompleteTripRecord): boolean =>
  inRange(record.pickup_latitude, SERVICE_AREA_BOUNDS.minLat, SERVICE_AREA_BOUNDS.maxLat) &&
  inRange(record.dropoff_latitude, SERVICE_AREA_BOUNDS.minLat, SERVICE_AREA_BOUNDS.maxLat) &&
  inRange(record.pickup_longitude, SERVICE_AREA_BOUNDS.minLon, SERVICE_AREA_BOUNDS.maxLon) &&
  inRange(record.dropoff_longitude, SERVICE_AREA_BOUNDS.minLon, SERVICE_AREA_BOUNDS.maxLon)

type Check = (record: CompleteTripRecord, seenIds: Set<string>) => RejectReason | null

// Order matters: each check only sees the survivors of the ones before it.
const CHECKS: readonly Check[] = [
  (record, seenIds) => {
    if (seenIds.has(record.id)) {
      return 'duplicate_id'
    }
    seenIds.add(record.id)
    return null
  },
  (record) => (isInServiceArea(record) ? null : 'out_of_bounds'),
  (record) => (record.trip_duration > 0 ? null : 'non_positive_duration'),
]

/**
 * Filters structurally invalid records out of one batch.
 * Duplicate ids are detected within the batch only; the first occurrence is kept.
 * @param batch Raw records in source order.
 * @returns Surviving records and a tally of dropped records per reason.
 */
export const validateBatch = (batch: readonly RawTripRecord[]): ValidationResult => {
  const rejected = emptyRejectCounts()
  const seenIds = new Set<string>()
  const valid: CompleteTripRecord[] = []

  for (const record of batch) {
    if (!isComplete(record)) {
      rejected.missing_field += 1
      continue
    }

    let reason: RejectReason | null = null
    for (const check of CHECKS) {
      reason = check(record, seenIds)
      if (reason) {
        break
      }
    }

    if (reason) {
      rejected[reason] += 1
      continue
    }
    valid.push(record)
  }

  return { valid, rejected }
}
