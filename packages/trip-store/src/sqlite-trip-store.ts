import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import type {
  CategoryCount,
  DistributionFilter,
  EnrichedTripRecord,
  HourCount,
  TripFilter,
  TripQuerySurface,
  TripSummaryRow,
  TripWriter,
} from '@trip-insights/trip-common'
import { AccessQueue } from './access-queue'
import { buildWhereClause } from './filters'
import {
  CREATE_TRIP_INDEXES,
  CREATE_TRIPS_TABLE,
  INSERT_TRIP,
  TRIPS_TABLE,
  type TripColumn,
} from './schema'

type InsertRow = Record<TripColumn, string | number | null>

interface HourRow {
  hour: number | null
  count: number
}

interface SpeedRow {
  speed: number | null
}

const MEMORY_DATABASE = ':memory:'

const toInsertRow = (record: EnrichedTripRecord): InsertRow => ({
  id: record.id,
  vendor_id: record.vendor_id,
  pickup_datetime: record.pickup_datetime,
  dropoff_datetime: record.dropoff_datetime,
  passenger_count: record.passenger_count,
  pickup_longitude: record.pickup_longitude,
  pickup_latitude: record.pickup_latitude,
  dropoff_longitude: record.dropoff_longitude,
  dropoff_latitude: record.dropoff_latitude,
  store_and_fwd_flag: record.store_and_fwd_flag,
  trip_duration: record.trip_duration,
  trip_distance_km: record.trip_distance_km,
  trip_speed_kmh: record.trip_speed_kmh,
  duration_category: record.duration_category,
  rush_hour_flag: record.rush_hour_flag,
})

/**
 * Applies the trips table and its indexes. Safe to run on every start.
 * @param db Open database handle.
 */
export const applySchema = (db: Database.Database): void => {
  db.exec(CREATE_TRIPS_TABLE)
  for (const statement of CREATE_TRIP_INDEXES) {
    db.exec(statement)
  }
}

/**
 * SQLite-backed trip store. Inserts are insert-if-absent by id, so re-running
 * ingestion over the same input leaves the row count unchanged.
 * Every read and write is serialized through one access queue.
 */
export class SqliteTripStore implements TripWriter, TripQuerySurface {
  private readonly queue = new AccessQueue()
  private readonly insertBatch: (rows: InsertRow[]) => number
  private closed = false

  private constructor(
    private readonly db: Database.Database,
    public readonly path: string
  ) {
    const insert = db.prepare<[InsertRow]>(INSERT_TRIP)
    this.insertBatch = db.transaction((rows: InsertRow[]): number => {
      let inserted = 0
      for (const row of rows) {
        inserted += insert.run(row).changes
      }
      return inserted
    })
  }

  /**
   * Opens (and creates, if needed) the database file and applies the schema.
   * @param path SQLite file path or ":memory:".
   */
  public static open(path: string): SqliteTripStore {
    if (path !== MEMORY_DATABASE) {
      mkdirSync(dirname(path), { recursive: true })
    }
    const db = new Database(path)
    if (path !== MEMORY_DATABASE) {
      db.pragma('journal_mode = WAL')
    }
    applySchema(db)
    return new SqliteTripStore(db, path)
  }

  /**
   * Inserts a batch inside one transaction; rows whose id already exists are ignored.
   * @returns Number of rows newly inserted.
   */
  public persist(records: readonly EnrichedTripRecord[]): Promise<number> {
    return this.queue.run(() => {
      if (records.length === 0) {
        return 0
      }
      return this.insertBatch(records.map(toInsertRow))
    })
  }

  public summarize(filter: TripFilter): Promise<TripSummaryRow> {
    return this.queue.run(() => {
      const where = buildWhereClause(filter)
      const row = this.db
        .prepare<unknown[], TripSummaryRow>(
          `SELECT
             COUNT(*) AS trips,
             AVG(trip_duration) AS avgDurationS,
             AVG(trip_distance_km) AS avgKm,
             AVG(trip_speed_kmh) AS avgKmh
           FROM ${TRIPS_TABLE}
           ${where.sql}`
        )
        .get(...where.params)
      return row ?? { trips: 0, avgDurationS: null, avgKm: null, avgKmh: null }
    })
  }

  public countByHour(filter: TripFilter): Promise<HourCount[]> {
    return this.queue.run(() => {
      const where = buildWhereClause(filter)
      const rows = this.db
        .prepare<unknown[], HourRow>(
          `SELECT CAST(strftime('%H', substr(pickup_datetime, 1, 19)) AS INTEGER) AS hour,
                  COUNT(*) AS count
           FROM ${TRIPS_TABLE}
           ${where.sql}
           GROUP BY hour
           ORDER BY hour`
        )
        .all(...where.params)

      const counts: HourCount[] = []
      for (const row of rows) {
        if (row.hour !== null) {
          counts.push({ hour: row.hour, count: row.count })
        }
      }
      return counts
    })
  }

  public countByCategory(filter: DistributionFilter): Promise<CategoryCount[]> {
    return this.queue.run(() => {
      const where = buildWhereClause(filter)
      return this.db
        .prepare<unknown[], CategoryCount>(
          `SELECT duration_category AS category, COUNT(*) AS count
           FROM ${TRIPS_TABLE}
           ${where.sql}
           GROUP BY duration_category
           ORDER BY duration_category`
        )
        .all(...where.params)
    })
  }

  public speeds(filter: TripFilter): Promise<Array<number | null>> {
    return this.queue.run(() => {
      const where = buildWhereClause(filter)
      const rows = this.db
        .prepare<unknown[], SpeedRow>(
          `SELECT trip_speed_kmh AS speed FROM ${TRIPS_TABLE} ${where.sql}`
        )
        .all(...where.params)
      return rows.map((row) => row.speed)
    })
  }

  public countTrips(): Promise<number> {
    return this.queue.run(() => {
      const row = this.db
        .prepare<[], { trips: number }>(`SELECT COUNT(*) AS trips FROM ${TRIPS_TABLE}`)
        .get()
      return row?.trips ?? 0
    })
  }

  /**
   * Waits for queued operations, then closes the database.
   */
  public close(): Promise<void> {
    return this.queue.run(() => {
      if (this.closed) {
        return
      }
      this.closed = true
      this.db.close()
    })
  }
}
