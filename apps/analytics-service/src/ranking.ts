import type { BusiestHour, HistogramBin, HourCount } from '@trip-insights/trip-common'

/**
 * Picks the k hours with the most trips.
 * Each round scans the remaining hours in their given (ascending) order and takes the
 * first maximum, so equal counts resolve to the smaller hour.
 * @param counts Trip counts per hour, ascending by hour.
 * @param k Number of hours to return.
 */
export const selectTopHours = (counts: readonly HourCount[], k: number): BusiestHour[] => {
  const remaining = [...counts]
  const top: BusiestHour[] = []

  while (top.length < k && remaining.length > 0) {
    let best = 0
    for (let i = 1; i < remaining.length; i += 1) {
      if (remaining[i].count > remaining[best].count) {
        best = i
      }
    }
    const [picked] = remaining.splice(best, 1)
    top.push({ hour: picked.hour, trips: picked.count })
  }

  return top
}

interface Bucket {
  low: number
  count: number
}

const insertionSortByLow = (buckets: Bucket[]): Bucket[] => {
  const sorted = [...buckets]
  for (let i = 1; i < sorted.length; i += 1) {
    const current = sorted[i]
    let j = i - 1
    while (j >= 0 && sorted[j].low > current.low) {
      sorted[j + 1] = sorted[j]
      j -= 1
    }
    sorted[j + 1] = current
  }
  return sorted
}

/**
 * Buckets speeds into fixed-width bins labelled "<low>-<high>".
 * Absent, non-finite and negative speeds are skipped; empty bins are not emitted.
 * @param speeds Speeds in km/h.
 * @param binSize Bin width (positive integer).
 * @returns Bins ascending by lower bound.
 */
export const binSpeeds = (
  speeds: ReadonlyArray<number | null>,
  binSize: number
): HistogramBin[] => {
  const buckets = new Map<number, Bucket>()
  for (const speed of speeds) {
    if (speed === null || !Number.isFinite(speed) || speed < 0) {
      continue
    }
    const low = Math.floor(speed / binSize) * binSize
    const bucket = buckets.get(low)
    if (bucket) {
      bucket.count += 1
    } else {
      buckets.set(low, { low, count: 1 })
    }
  }

  return insertionSortByLow([...buckets.values()]).map((bucket) => ({
    label: `${bucket.low}-${bucket.low + binSize}`,
    count: bucket.count,
  }))
}
