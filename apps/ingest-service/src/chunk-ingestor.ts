import {
  MetricsCollector,
  silentLogger,
  type IngestMetrics,
  type Logger,
  type RawTripRecord,
  type TripWriter,
} from '@trip-insights/trip-common'
import type { FeatureDeriver } from './feature-deriver'
import type { RecordSource } from './record-source'
import { REJECT_REASONS, validateBatch, type RejectReason, type ValidationResult } from './validator'

export const DEFAULT_BATCH_SIZE = 100_000

export type IngestRejectReason = RejectReason | 'invalid_time'

export interface ChunkIngestorOptions {
  deriver: FeatureDeriver
  store: TripWriter
  batchSize?: number
  validate?: (batch: readonly RawTripRecord[]) => ValidationResult
  logger?: Logger
  metrics?: MetricsCollector
}

/**
 * Outcome of one ingestion run.
 */
export interface IngestSummary {
  /** Rows newly added to the store by this run. */
  totalInserted: number
  /** Enriched rows handed to the store, including ids it already held. */
  totalPersisted: number
  batches: number
  recordsRead: number
  rejected: Record<IngestRejectReason, number>
  /** Persisted rows flagged for implausible speed or distance. */
  anomalies: number
  metrics: IngestMetrics
}

const emptyRejected = (): Record<IngestRejectReason, number> => ({
  missing_field: 0,
  duplicate_id: 0,
  out_of_bounds: 0,
  non_positive_duration: 0,
  invalid_time: 0,
})

/**
 * Groups a record stream into arrays of at most `size` records.
 * @param records Source stream.
 * @param size Maximum batch length (positive integer).
 */
export async function* chunkRecords<T>(
  records: AsyncIterable<T>,
  size: number
): AsyncGenerator<T[]> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error('batchSize must be a positive integer')
  }
  let batch: T[] = []
  for await (const record of records) {
    batch.push(record)
    if (batch.length >= size) {
      yield batch
      batch = []
    }
  }
  if (batch.length > 0) {
    yield batch
  }
}

/**
 * Drives fixed-size batches through validation, feature derivation and
 * persistence. Batches run strictly one after another: the next batch is not
 * read until the previous persist call has resolved.
 */
export class ChunkIngestor {
  private readonly deriver: FeatureDeriver
  private readonly store: TripWriter
  private readonly batchSize: number
  private readonly validate: (batch: readonly RawTripRecord[]) => ValidationResult
  private readonly logger: Logger
  private readonly metrics: MetricsCollector

  constructor(options: ChunkIngestorOptions) {
    this.deriver = options.deriver
    this.store = options.store
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
    this.validate = options.validate ?? validateBatch
    this.logger = options.logger ?? silentLogger
    this.metrics = options.metrics ?? new MetricsCollector('ingest')
  }

  /**
   * Ingests every record of the source.
   * @param source Raw record source.
   * @returns Totals for the run.
   * @throws SourceUnavailableError when the source cannot be opened; nothing is persisted then.
   */
  async run(source: RecordSource): Promise<IngestSummary> {
    const records = await source.open()
    this.logger.info(`Reading ${source.description} in batches of ${this.batchSize}`)

    const rejected = emptyRejected()
    let totalInserted = 0
    let totalPersisted = 0
    let anomalies = 0
    let batchNumber = 0
    let recordsRead = 0

    const batches = chunkRecords(records, this.batchSize)
    try {
      for (;;) {
        const next = await this.metrics.recordAsync('read', () => batches.next())
        if (next.done) {
          break
        }
        const batch = next.value
        batchNumber += 1
        recordsRead += batch.length
        this.metrics.recordBatch(batch.length)

        const validation = this.metrics.record('validate', () => this.validate(batch))
        for (const reason of REJECT_REASONS) {
          rejected[reason] += validation.rejected[reason]
        }

        if (validation.valid.length === 0) {
          this.logger.info(`batch ${batchNumber}: ${batch.length} read, nothing to insert (all invalid)`)
          continue
        }

        const derived = this.metrics.record('derive', () =>
          this.deriver.derive(validation.valid, { batch: batchNumber })
        )
        rejected.invalid_time += derived.timeRejected
        anomalies += derived.anomalies

        if (derived.records.length === 0) {
          this.logger.info(`batch ${batchNumber}: ${batch.length} read, no rows left after timestamp checks`)
          continue
        }

        const inserted = await this.metrics.recordAsync('persist', () =>
          this.store.persist(derived.records)
        )
        totalInserted += inserted
        totalPersisted += derived.records.length

        this.logger.info(
          `batch ${batchNumber}: ${batch.length} read, ${validation.valid.length} valid, ` +
            `${derived.records.length} enriched, ${inserted} new (running total ${totalInserted})`
        )
      }
    } finally {
      // releases the underlying file when a batch fails
      await batches.return(undefined)
    }

    return {
      totalInserted,
      totalPersisted,
      batches: batchNumber,
      recordsRead,
      rejected,
      anomalies,
      metrics: this.metrics.getMetrics(),
    }
  }
}
