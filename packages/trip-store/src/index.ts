export { AccessQueue } from './access-queue'
export { DEFAULT_DATABASE_URL, resolveDatabasePath } from './database-url'
export { buildWhereClause, type SqlParameter, type WhereClause } from './filters'
export { TRIP_COLUMNS, TRIPS_TABLE, type TripColumn } from './schema'
export { SqliteTripStore, applySchema } from './sqlite-trip-store'
