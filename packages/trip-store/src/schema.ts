export const TRIPS_TABLE = 'taxi_trips'

/**
 * Columns of the trips table, in insert order.
 */
export const TRIP_COLUMNS = [
  'id',
  'vendor_id',
  'pickup_datetime',
  'dropoff_datetime',
  'passenger_count',
  'pickup_longitude',
  'pickup_latitude',
  'dropoff_longitude',
  'dropoff_latitude',
  'store_and_fwd_flag',
  'trip_duration',
  'trip_distance_km',
  'trip_speed_kmh',
  'duration_category',
  'rush_hour_flag',
] as const

export type TripColumn = (typeof TRIP_COLUMNS)[number]

export const CREATE_TRIPS_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TRIPS_TABLE} (
    id TEXT PRIMARY KEY,
    vendor_id TEXT,
    pickup_datetime TEXT,
    dropoff_datetime TEXT,
    passenger_count INTEGER,
    pickup_longitude REAL,
    pickup_latitude REAL,
    dropoff_longitude REAL,
    dropoff_latitude REAL,
    store_and_fwd_flag TEXT,
    trip_duration INTEGER,
    trip_distance_km REAL,
    trip_speed_kmh REAL,
    duration_category TEXT,
    rush_hour_flag INTEGER
  )
`

// Secondary indexes backing the aggregation filters.
export const CREATE_TRIP_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_pickup_datetime ON ${TRIPS_TABLE} (pickup_datetime)`,
  `CREATE INDEX IF NOT EXISTS idx_duration_category ON ${TRIPS_TABLE} (duration_category)`,
  `CREATE INDEX IF NOT EXISTS idx_speed ON ${TRIPS_TABLE} (trip_speed_kmh)`,
  `CREATE INDEX IF NOT EXISTS idx_rush ON ${TRIPS_TABLE} (rush_hour_flag)`,
] as const

export const INSERT_TRIP = `
  INSERT OR IGNORE INTO ${TRIPS_TABLE} (${TRIP_COLUMNS.join(', ')})
  VALUES (${TRIP_COLUMNS.map((column) => `@${column}`).join(', ')})
`
