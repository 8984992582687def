import type { DistributionFilter } from '@trip-insights/trip-common'

export type SqlParameter = string | number

export interface WhereClause {
  sql: string
  params: SqlParameter[]
}

const PICKUP_DATE = 'date(substr(pickup_datetime, 1, 19))'

/**
 * Builds a parameterized WHERE clause for the aggregation filters.
 * @param filter Date range plus the optional distribution filters.
 * @returns Clause text (empty when unfiltered) and its bound parameters.
 */
export const buildWhereClause = (filter: DistributionFilter): WhereClause => {
  const conditions: string[] = []
  const params: SqlParameter[] = []

  if (filter.start) {
    conditions.push(`${PICKUP_DATE} >= date(?)`)
    params.push(filter.start)
  }
  if (filter.end) {
    conditions.push(`${PICKUP_DATE} <= date(?)`)
    params.push(filter.end)
  }
  if (filter.rush !== undefined) {
    conditions.push('rush_hour_flag = ?')
    params.push(filter.rush)
  }
  if (filter.minPassengers !== undefined) {
    conditions.push('passenger_count >= ?')
    params.push(filter.minPassengers)
  }
  if (filter.maxPassengers !== undefined) {
    conditions.push('passenger_count <= ?')
    params.push(filter.maxPassengers)
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  }
}
