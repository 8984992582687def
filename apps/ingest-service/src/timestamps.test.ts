import { describe, expect, it } from 'vitest'
import { parseTimestamp, parseWrittenClockTime, timeOfDayMs } from './timestamps'

describe('parseTimestamp', () => {
  it('parses ISO timestamps with a space or T separator', () => {
    expect(parseTimestamp('2016-03-14 17:24:55')).toEqual(new Date(2016, 2, 14, 17, 24, 55))
    expect(parseTimestamp('2016-03-14T17:24:55')).toEqual(new Date(2016, 2, 14, 17, 24, 55))
  })

  it('falls back to US-style dates', () => {
    expect(parseTimestamp('03/14/2016 17:24:55')).toEqual(new Date(2016, 2, 14, 17, 24, 55))
    expect(parseTimestamp('03/14/2016 17:24')).toEqual(new Date(2016, 2, 14, 17, 24, 0))
    expect(parseTimestamp('2016/03/14 17:24:55')).toEqual(new Date(2016, 2, 14, 17, 24, 55))
  })

  it('returns null for missing or unparseable values', () => {
    expect(parseTimestamp(null)).toBeNull()
    expect(parseTimestamp('   ')).toBeNull()
    expect(parseTimestamp('yesterday')).toBeNull()
    expect(parseTimestamp('2016-02-30 10:00:00')).toBeNull()
  })
})

describe('parseWrittenClockTime', () => {
  it('keeps the written clock time and drops the offset', () => {
    expect(parseWrittenClockTime('2016-03-14T08:30:00-05:00')).toEqual(new Date(2016, 2, 14, 8, 30, 0))
    expect(parseWrittenClockTime('2016-03-14 08:30:00+0100')).toEqual(new Date(2016, 2, 14, 8, 30, 0))
    expect(parseWrittenClockTime('2016-03-14T23:05:00Z')).toEqual(new Date(2016, 2, 14, 23, 5, 0))
  })

  it('reads timestamps without an offset as parseTimestamp does', () => {
    expect(parseWrittenClockTime('2016-03-14 17:24:55')).toEqual(new Date(2016, 2, 14, 17, 24, 55))
    expect(parseWrittenClockTime('03/14/2016 17:24')).toEqual(new Date(2016, 2, 14, 17, 24, 0))
    expect(parseWrittenClockTime(null)).toBeNull()
    expect(parseWrittenClockTime('soon')).toBeNull()
  })
})

describe('timeOfDayMs', () => {
  it('counts milliseconds since local midnight', () => {
    expect(timeOfDayMs(new Date(2016, 2, 14, 0, 0, 0))).toBe(0)
    expect(timeOfDayMs(new Date(2016, 2, 14, 9, 0, 1))).toBe(9 * 3_600_000 + 1000)
  })
})
