import { describe, expect, it } from 'vitest'
import { buildWhereClause } from './filters'

describe('buildWhereClause', () => {
  it('returns an empty clause without filters', () => {
    expect(buildWhereClause({})).toEqual({ sql: '', params: [] })
  })

  it('combines every filter in a fixed order', () => {
    const clause = buildWhereClause({
      start: '2016-01-01',
      end: '2016-01-31',
      rush: 0,
      minPassengers: 1,
      maxPassengers: 4,
    })

    expect(clause.sql).toBe(
      'WHERE date(substr(pickup_datetime, 1, 19)) >= date(?)' +
        ' AND date(substr(pickup_datetime, 1, 19)) <= date(?)' +
        ' AND rush_hour_flag = ?' +
        ' AND passenger_count >= ?' +
        ' AND passenger_count <= ?'
    )
    expect(clause.params).toEqual(['2016-01-01', '2016-01-31', 0, 1, 4])
  })

  it('keeps a zero passenger bound', () => {
    expect(buildWhereClause({ maxPassengers: 0 })).toEqual({
      sql: 'WHERE passenger_count <= ?',
      params: [0],
    })
  })
})
