import {
  DURATION_CATEGORIES,
  type BusiestHour,
  type DistributionFilter,
  type DurationCategory,
  type HistogramBin,
  type TripFilter,
  type TripQuerySurface,
  type TripSummary,
} from '@trip-insights/trip-common'
import { binSpeeds, selectTopHours } from './ranking'

export type DurationDistribution = Partial<Record<DurationCategory, number>>

const isDurationCategory = (value: string): value is DurationCategory =>
  DURATION_CATEGORIES.some((category) => category === value)

/**
 * Read-only aggregations over persisted trips. Parameters are expected to be
 * validated by the caller.
 */
export class AggregationEngine {
  constructor(private readonly store: TripQuerySurface) {}

  /**
   * Trip count and averages; every field is 0 when no trip matches.
   */
  async summary(filter: TripFilter = {}): Promise<TripSummary> {
    const row = await this.store.summarize(filter)
    return {
      trips: row.trips,
      avg_duration_s: row.avgDurationS ?? 0,
      avg_km: row.avgKm ?? 0,
      avg_kmh: row.avgKmh ?? 0,
    }
  }

  /**
   * @param k Number of hours to return.
   */
  async busiestHours(k: number, filter: TripFilter = {}): Promise<BusiestHour[]> {
    const counts = await this.store.countByHour(filter)
    return selectTopHours(counts, k)
  }

  /**
   * Trips per duration category. Categories without trips are left out.
   */
  async distribution(filter: DistributionFilter = {}): Promise<DurationDistribution> {
    const distribution: DurationDistribution = {}
    for (const { category, count } of await this.store.countByCategory(filter)) {
      if (isDurationCategory(category) && count > 0) {
        distribution[category] = count
      }
    }
    return distribution
  }

  /**
   * @param binSize Bin width in km/h.
   */
  async speedHistogram(binSize: number, filter: TripFilter = {}): Promise<HistogramBin[]> {
    return binSpeeds(await this.store.speeds(filter), binSize)
  }
}
