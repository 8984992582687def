import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { RawTripRecord } from '@trip-insights/trip-common'
import {
  createFileRecordSource,
  createIterableRecordSource,
  detectSourceFormat,
  SourceUnavailableError,
  toRawTripRecord,
  type RecordSource,
} from './record-source'

const collect = async (source: RecordSource): Promise<RawTripRecord[]> => {
  const records: RawTripRecord[] = []
  for await (const record of await source.open()) {
    records.push(record)
  }
  return records
}

const CSV_HEADER =
  'id,vendor_id,pickup_datetime,dropoff_datetime,passenger_count,pickup_longitude,' +
  'pickup_latitude,dropoff_longitude,dropoff_latitude,store_and_fwd_flag,trip_duration'

describe('toRawTripRecord', () => {
  it('parses numeric text and trims strings', () => {
    expect(
      toRawTripRecord({
        id: ' id1 ',
        vendor_id: 2,
        pickup_datetime: '2016-03-14 17:24:55',
        dropoff_datetime: '2016-03-14 17:32:30',
        passenger_count: '1',
        pickup_longitude: '-73.98',
        pickup_latitude: 40.76,
        dropoff_longitude: '-73.96',
        dropoff_latitude: '40.77',
        store_and_fwd_flag: 'N',
        trip_duration: '455',
      })
    ).toEqual({
      id: 'id1',
      vendor_id: '2',
      pickup_datetime: '2016-03-14 17:24:55',
      dropoff_datetime: '2016-03-14 17:32:30',
      passenger_count: 1,
      pickup_longitude: -73.98,
      pickup_latitude: 40.76,
      dropoff_longitude: -73.96,
      dropoff_latitude: 40.77,
      store_and_fwd_flag: 'N',
      trip_duration: 455,
    })
  })

  it('turns blank or unparseable cells into null', () => {
    const record = toRawTripRecord({ pickup_latitude: 'abc', trip_duration: '', vendor_id: '  ' })
    expect(record.pickup_latitude).toBeNull()
    expect(record.trip_duration).toBeNull()
    expect(record.vendor_id).toBeNull()
    expect(record.id).toBe('')
  })

  it('maps non-object rows to an empty record', () => {
    expect(toRawTripRecord(null).pickup_datetime).toBeNull()
    expect(toRawTripRecord('text').id).toBe('')
  })
})

describe('detectSourceFormat', () => {
  it('selects the reader from the extension', () => {
    expect(detectSourceFormat('trips.CSV')).toBe('csv')
    expect(detectSourceFormat('trips.ndjson')).toBe('ndjson')
    expect(detectSourceFormat('trips.jsonl')).toBe('ndjson')
  })

  it('rejects other extensions', () => {
    expect(() => detectSourceFormat('trips.parquet')).toThrow(
      'Unsupported raw source format ".parquet" for trips.parquet'
    )
  })
})

describe('createFileRecordSource', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'record-source-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('streams CSV rows and skips blank lines', async () => {
    const path = join(dir, 'trips.csv')
    await writeFile(
      path,
      [
        CSV_HEADER,
        'a,1,2016-03-14 17:24:55,2016-03-14 17:32:30,1,-73.98,40.76,-73.96,40.77,N,455',
        '',
        'b,2,2016-03-14 18:00:00,,2,-73.90,40.70,-73.91,40.71,N,300',
        '',
      ].join('\n')
    )

    const records = await collect(createFileRecordSource(path))
    expect(records.map((record) => record.id)).toEqual(['a', 'b'])
    expect(records[0].trip_duration).toBe(455)
    expect(records[1].dropoff_datetime).toBeNull()
    expect(records[1].passenger_count).toBe(2)
  })

  it('streams NDJSON objects and keeps unparseable lines as empty records', async () => {
    const path = join(dir, 'trips.ndjson')
    await writeFile(
      path,
      [
        JSON.stringify({ id: 'a', pickup_latitude: 40.7, trip_duration: 60 }),
        '{not json',
        '',
        JSON.stringify({ id: 'b', pickup_latitude: '40.8' }),
      ].join('\n')
    )

    const records = await collect(createFileRecordSource(path))
    expect(records.map((record) => record.id)).toEqual(['a', '', 'b'])
    expect(records[1].pickup_latitude).toBeNull()
    expect(records[2].pickup_latitude).toBe(40.8)
  })

  it('fails with SourceUnavailableError for a missing file', async () => {
    const source = createFileRecordSource(join(dir, 'missing.csv'))
    await expect(source.open()).rejects.toBeInstanceOf(SourceUnavailableError)
  })

  it('fails with SourceUnavailableError for a directory', async () => {
    const source = createFileRecordSource(join(dir, 'folder.csv'))
    await mkdir(join(dir, 'folder.csv'))
    await expect(source.open()).rejects.toThrow(
      `Raw trip source not found or unreadable: ${join(dir, 'folder.csv')}`
    )
  })
})

describe('createIterableRecordSource', () => {
  it('yields the given records', async () => {
    const record = toRawTripRecord({ id: 'x' })
    const records = await collect(createIterableRecordSource([record]))
    expect(records).toEqual([record])
  })
})
