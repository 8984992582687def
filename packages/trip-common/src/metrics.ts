import type { Logger } from './logger'

/**
 * Ingestion stages timed by the collector.
 */
export type IngestStage = 'read' | 'validate' | 'derive' | 'persist'

export const INGEST_STAGES: readonly IngestStage[] = ['read', 'validate', 'derive', 'persist'] as const

/**
 * Stage-level timing breakdown for one ingestion run.
 */
export interface IngestMetrics {
  runName: string
  batches: number
  recordsProcessed: number
  stageTimeMs: Record<IngestStage, number>
}

const emptyStageTimes = (): Record<IngestStage, number> => ({
  read: 0,
  validate: 0,
  derive: 0,
  persist: 0,
})

export class MetricsCollector {
  private readonly runName: string
  private batches = 0
  private recordsProcessed = 0
  private readonly stageTimeMs = emptyStageTimes()

  constructor(runName: string) {
    this.runName = runName
  }

  /**
   * Measure a synchronous stage
   */
  record<T>(stage: IngestStage, fn: () => T): T {
    const start = performance.now()
    const result = fn()
    this.stageTimeMs[stage] += performance.now() - start
    return result
  }

  /**
   * Measure an async stage
   */
  async recordAsync<T>(stage: IngestStage, fn: () => Promise<T>): Promise<T> {
    const start = performance.now()
    const result = await fn()
    this.stageTimeMs[stage] += performance.now() - start
    return result
  }

  /**
   * Count a finished batch and the raw records it held
   */
  recordBatch(size: number): void {
    this.batches += 1
    this.recordsProcessed += size
  }

  getMetrics(): IngestMetrics {
    return {
      runName: this.runName,
      batches: this.batches,
      recordsProcessed: this.recordsProcessed,
      stageTimeMs: { ...this.stageTimeMs },
    }
  }

  /**
   * Print metrics summary
   */
  printSummary(logger: Logger): void {
    const m = this.getMetrics()
    const totalTime = INGEST_STAGES.reduce((sum, stage) => sum + m.stageTimeMs[stage], 0)

    logger.info(`=== ${m.runName} metrics ===`)
    logger.info(`Batches: ${m.batches}, records read: ${m.recordsProcessed}`)
    for (const stage of INGEST_STAGES) {
      const time = m.stageTimeMs[stage]
      const share = totalTime === 0 ? 0 : (time / totalTime) * 100
      logger.info(`  ${stage}: ${time.toFixed(2)}ms (${share.toFixed(1)}%)`)
    }
    if (m.recordsProcessed > 0) {
      logger.info(`  per record: ${(totalTime / m.recordsProcessed).toFixed(4)}ms`)
    }
  }
}
