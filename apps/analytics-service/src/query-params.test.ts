import { describe, expect, it } from 'vitest'
import {
  ParameterError,
  parseBusiestHoursParams,
  parseDistributionParams,
  parseSpeedHistogramParams,
  parseSummaryParams,
} from './query-params'

const issuesOf = (parse: () => unknown): string[] => {
  try {
    parse()
  } catch (error) {
    if (error instanceof ParameterError) {
      return error.issues
    }
    throw error
  }
  throw new Error('expected a ParameterError')
}

describe('parseSummaryParams', () => {
  it('accepts an open or partial date range', () => {
    expect(parseSummaryParams({})).toEqual({})
    expect(parseSummaryParams({ start: '2016-01-01', end: '' })).toEqual({ start: '2016-01-01' })
    expect(parseSummaryParams({ start: '2016-01-01', end: '2016-06-30' })).toEqual({
      start: '2016-01-01',
      end: '2016-06-30',
    })
  })

  it('rejects impossible dates', () => {
    expect(issuesOf(() => parseSummaryParams({ start: '2016-13-01' }))).toEqual([
      'start: not a calendar date',
    ])
    expect(issuesOf(() => parseSummaryParams({ end: '2016-02-30' }))).toEqual(['end: not a calendar date'])
  })

  it('rejects other date formats', () => {
    expect(issuesOf(() => parseSummaryParams({ start: '01/02/2016' }))).toContain(
      'start: expected a date as YYYY-MM-DD'
    )
  })
})

describe('parseBusiestHoursParams', () => {
  it('defaults k to 5', () => {
    expect(parseBusiestHoursParams({})).toEqual({ k: 5, filter: {} })
  })

  it('accepts k as text or number', () => {
    expect(parseBusiestHoursParams({ k: '3', start: '2016-01-01' })).toEqual({
      k: 3,
      filter: { start: '2016-01-01' },
    })
    expect(parseBusiestHoursParams({ k: 4 }).k).toBe(4)
  })

  it('rejects k that is not a positive integer', () => {
    expect(issuesOf(() => parseBusiestHoursParams({ k: '0' }))).toEqual(['k: must be a positive integer'])
    expect(issuesOf(() => parseBusiestHoursParams({ k: 'abc' }))).toEqual(['k: expected an integer'])
    expect(issuesOf(() => parseBusiestHoursParams({ k: 2.5 }))).toEqual(['k: expected an integer'])
  })
})

describe('parseDistributionParams', () => {
  it('maps the optional filters', () => {
    expect(
      parseDistributionParams({ rush: '1', min_passengers: '2', max_passengers: '4', start: '' })
    ).toEqual({ rush: 1, minPassengers: 2, maxPassengers: 4 })
    expect(parseDistributionParams({ rush: 0 })).toEqual({ rush: 0 })
  })

  it('rejects invalid filters', () => {
    expect(issuesOf(() => parseDistributionParams({ rush: '2' }))).toEqual(['rush: expected 0 or 1'])
    expect(issuesOf(() => parseDistributionParams({ min_passengers: '-1' }))).toEqual([
      'min_passengers: must not be negative',
    ])
  })
})

describe('parseSpeedHistogramParams', () => {
  it('defaults the bin size to 5', () => {
    expect(parseSpeedHistogramParams({})).toEqual({ binSize: 5, filter: {} })
    expect(parseSpeedHistogramParams({ bin_size: '10' }).binSize).toBe(10)
  })

  it('reports every problem at once', () => {
    const issues = issuesOf(() => parseSpeedHistogramParams({ bin_size: '-5', start: '2016-02-30' }))
    expect(issues).toHaveLength(2)
    expect(issues).toContain('bin_size: must be a positive integer')
    expect(issues).toContain('start: not a calendar date')
  })
})
