/* eslint-disable no-console */
import { createLogger } from '@trip-insights/trip-common'
import { resolveDatabasePath, SqliteTripStore } from '@trip-insights/trip-store'
import { AggregationEngine } from './aggregation'
import { startAnalyticsGrpcService, type AnalyticsGrpcHandle } from './analytics-grpc'
import { parseAnalyticsArgs, usage } from './config'
import { startAnalyticsHttpServer, type AnalyticsHttpHandle } from './http-api'

const logger = createLogger('analytics')

const run = async (): Promise<void> => {
  let store: SqliteTripStore | null = null
  let httpHandle: AnalyticsHttpHandle | null = null
  let grpcHandle: AnalyticsGrpcHandle | null = null
  let shuttingDown = false

  const stopAll = async (): Promise<void> => {
    if (shuttingDown) {
      return
    }
    shuttingDown = true

    const errors: Error[] = []

    if (httpHandle) {
      try {
        await httpHandle.stop()
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error('HTTP API shutdown failed'))
      }
      httpHandle = null
    }

    if (grpcHandle) {
      try {
        await grpcHandle.stop()
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error('gRPC service shutdown failed'))
      }
      grpcHandle = null
    }

    if (store) {
      try {
        await store.close()
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error('Database close failed'))
      }
      store = null
    }

    if (errors.length > 0) {
      for (const error of errors) {
        logger.error(error.message)
      }
      process.exit(1)
    }
  }

  const handleSignal = (signal: string): void => {
    if (shuttingDown) {
      return
    }
    logger.info(`Received ${signal}. Shutting down analytics service...`)
    void stopAll().then(() => {
      logger.info('Analytics service stopped.')
      process.exit(0)
    })
  }

  process.on('SIGINT', () => handleSignal('SIGINT'))
  process.on('SIGTERM', () => handleSignal('SIGTERM'))

  try {
    const config = parseAnalyticsArgs(process.argv.slice(2))
    if (config.help) {
      console.log(usage)
      return
    }

    const databasePath = resolveDatabasePath(config.database)
    store = SqliteTripStore.open(databasePath)
    const engine = new AggregationEngine(store)
    logger.info(`Serving trips from ${databasePath}`)

    if (config.http) {
      httpHandle = await startAnalyticsHttpServer(
        { host: config.httpHost, port: config.httpPort },
        { engine, databaseUrl: config.database, databasePath, logger }
      )
    }
    if (config.grpc) {
      grpcHandle = await startAnalyticsGrpcService({ address: config.grpcAddress }, engine, logger)
    }
  } catch (error) {
    logger.error('Failed to start analytics service', error)
    await stopAll()
    process.exit(1)
  }
}

void run()
