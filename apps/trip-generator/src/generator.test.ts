import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import Papa from 'papaparse'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { RAW_TRIP_COLUMNS } from '@trip-insights/trip-common'
import { generateTrips } from './generator'

const readRows = async (filePath: string): Promise<Array<Record<string, string>>> => {
  const contents = await readFile(filePath, 'utf8')
  return Papa.parse<Record<string, string>>(contents, { header: true, skipEmptyLines: true }).data
}

describe('generateTrips', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'trip-generator-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes a header and one line per trip', async () => {
    const outputFile = join(tempDir, 'raw', 'trips.csv')
    const summary = await generateTrips({ tripCount: 25, outputFile, seed: 7, defectRate: 0 })

    const contents = await readFile(outputFile, 'utf8')
    const lines = contents.trimEnd().split('\n')
    expect(lines[0]).toBe(RAW_TRIP_COLUMNS.join(','))
    expect(lines).toHaveLength(26)
    expect(summary.rows).toBe(25)
    expect(Object.values(summary.defects).every((count) => count === 0)).toBe(true)
  })

  it('writes only well-formed trips when the defect rate is 0', async () => {
    const outputFile = join(tempDir, 'trips.csv')
    await generateTrips({
      tripCount: 50,
      outputFile,
      seed: 11,
      defectRate: 0,
      startDate: new Date(2016, 5, 1),
      days: 2,
    })

    const rows = await readRows(outputFile)
    expect(rows).toHaveLength(50)
    expect(new Set(rows.map((row) => row.id)).size).toBe(50)
    for (const row of rows) {
      const latitude = Number(row.pickup_latitude)
      const duration = Number(row.trip_duration)
      expect(latitude).toBeGreaterThanOrEqual(40.7)
      expect(latitude).toBeLessThanOrEqual(40.85)
      expect(Number(row.dropoff_longitude)).toBeLessThanOrEqual(-73.9)
      expect(duration).toBeGreaterThanOrEqual(60)
      expect(duration).toBeLessThanOrEqual(3600)
      expect(row.pickup_datetime < row.dropoff_datetime).toBe(true)
      expect(row.pickup_datetime >= '2016-06-01 00:00:00').toBe(true)
      expect(row.pickup_datetime < '2016-06-03 00:00:00').toBe(true)
    }
  })

  it('marks every row as defective when the defect rate is 1', async () => {
    const outputFile = join(tempDir, 'trips.csv')
    const summary = await generateTrips({ tripCount: 40, outputFile, seed: 3, defectRate: 1 })

    const total = Object.values(summary.defects).reduce((sum, count) => sum + count, 0)
    expect(total).toBe(40)
  })

  it('is deterministic with the same seed', async () => {
    const fileA = join(tempDir, 'a.csv')
    const fileB = join(tempDir, 'b.csv')
    const config = { tripCount: 30, seed: 42, defectRate: 0.2 }

    await generateTrips({ ...config, outputFile: fileA })
    await generateTrips({ ...config, outputFile: fileB })

    expect(await readFile(fileA, 'utf8')).toBe(await readFile(fileB, 'utf8'))
  })

  it('rejects invalid configuration values', async () => {
    await expect(generateTrips({ tripCount: 0, outputFile: join(tempDir, 'x.csv') })).rejects.toThrow(
      'tripCount must be a positive integer'
    )
    await expect(
      generateTrips({ tripCount: 1, outputFile: join(tempDir, 'x.csv'), defectRate: 1.5 })
    ).rejects.toThrow('defectRate must be between 0 and 1')
  })
})
