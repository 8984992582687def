/* eslint-disable no-console */
import { createLogger, MetricsCollector, type Logger } from '@trip-insights/trip-common'
import { resolveDatabasePath, SqliteTripStore } from '@trip-insights/trip-store'
import { FileAnomalyLog } from './anomaly-log'
import { ChunkIngestor, type IngestSummary } from './chunk-ingestor'
import { closeAll } from './close-all'
import { parseIngestArgs, usage, type IngestConfig } from './config'
import { FeatureDeriver } from './feature-deriver'
import { formatPreview, previewSource } from './preview'
import { createFileRecordSource, SourceUnavailableError } from './record-source'

const logger = createLogger('ingest')

const reportSummary = (summary: IngestSummary, anomalyLog: FileAnomalyLog, log: Logger): void => {
  const { rejected } = summary
  log.info(
    `Dropped: ${rejected.missing_field} missing fields, ${rejected.duplicate_id} duplicate ids, ` +
      `${rejected.out_of_bounds} outside bounds, ${rejected.non_positive_duration} non-positive durations, ` +
      `${rejected.invalid_time} invalid timestamps`
  )
  log.info(`Anomalous rows kept: ${summary.anomalies}`)
  log.info(
    `Done. ${summary.totalInserted} new rows inserted (${summary.totalPersisted} persisted, duplicates ignored)`
  )
  if (anomalyLog.entryCount > 0) {
    log.info(`Logs: ${anomalyLog.path}`)
  }
}

const runPreview = async (config: IngestConfig, rows: number): Promise<void> => {
  const preview = await previewSource(createFileRecordSource(config.input), rows)
  logger.info(`Preview of ${config.input}:`)
  for (const line of formatPreview(preview)) {
    console.log(line)
  }
}

const runIngest = async (config: IngestConfig): Promise<void> => {
  const source = createFileRecordSource(config.input)
  const store = SqliteTripStore.open(resolveDatabasePath(config.database))
  const anomalyLog = new FileAnomalyLog(config.anomalyLog)
  const metrics = new MetricsCollector('ingest')

  const ingestor = new ChunkIngestor({
    deriver: new FeatureDeriver(anomalyLog),
    store,
    batchSize: config.batchSize,
    logger,
    metrics,
  })

  try {
    const summary = await ingestor.run(source)
    reportSummary(summary, anomalyLog, logger)
    metrics.printSummary(logger)
    logger.info(`Rows in ${store.path}: ${await store.countTrips()}`)
  } finally {
    await closeAll([() => anomalyLog.close(), () => store.close()])
  }
}

const run = async (): Promise<void> => {
  try {
    const config = parseIngestArgs(process.argv.slice(2))
    if (config.help) {
      console.log(usage)
      return
    }
    if (config.preview !== null) {
      await runPreview(config, config.preview)
      return
    }
    await runIngest(config)
  } catch (error) {
    if (error instanceof SourceUnavailableError) {
      logger.error(error.message)
    } else {
      logger.error('Ingestion failed', error)
    }
    process.exit(1)
  }
}

void run()
