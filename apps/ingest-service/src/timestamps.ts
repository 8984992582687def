import { isValid, parse, parseISO } from 'date-fns'

// Tried in order after ISO 8601 (which also covers "yyyy-MM-dd HH:mm:ss").
const FALLBACK_FORMATS = [
  'MM/dd/yyyy HH:mm:ss',
  'MM/dd/yyyy HH:mm',
  'yyyy/MM/dd HH:mm:ss',
] as const

const REFERENCE_DATE = new Date(2000, 0, 1)

/**
 * Parses a trip timestamp without throwing.
 * @param value Raw timestamp text.
 * @returns Parsed local date, or null when no known format matches.
 */
export const parseTimestamp = (value: string | null): Date | null => {
  if (value == null) {
    return null
  }
  const text = value.trim()
  if (text.length === 0) {
    return null
  }

  const iso = parseISO(text)
  if (isValid(iso)) {
    return iso
  }

  for (const format of FALLBACK_FORMATS) {
    const parsed = parse(text, format, REFERENCE_DATE)
    if (isValid(parsed)) {
      return parsed
    }
  }
  return null
}

// Trailing "Z", "+hh", "+hhmm" or "+hh:mm" after a clock time.
const UTC_OFFSET = /^(.*\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)\s*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i

/**
 * Parses the clock time as written, ignoring any UTC offset, so that
 * "2016-03-14T08:30:00-05:00" reads as 08:30 on whatever host runs it.
 * @param value Raw timestamp text.
 * @returns Local date carrying the written fields, or null when unparseable.
 */
export const parseWrittenClockTime = (value: string | null): Date | null => {
  if (value == null) {
    return null
  }
  const text = value.trim()
  const withoutOffset = UTC_OFFSET.exec(text)?.[1] ?? text
  return parseTimestamp(withoutOffset)
}

const MS_PER_HOUR = 3_600_000

/**
 * Milliseconds elapsed since local midnight.
 */
export const timeOfDayMs = (date: Date): number =>
  date.getHours() * MS_PER_HOUR +
  date.getMinutes() * 60_000 +
  date.getSeconds() * 1000 +
  date.getMilliseconds()

export const hoursToMs = (hours: number): number => hours * MS_PER_HOUR
