import { afterEach, describe, expect, it, vi } from 'vitest'
import type { Logger } from './logger'
import { MetricsCollector } from './metrics'

const createRecordingLogger = (): { logger: Logger; lines: string[] } => {
  const lines: string[] = []
  return {
    lines,
    logger: {
      info: (message) => lines.push(message),
      warn: (message) => lines.push(message),
      error: (message) => lines.push(message),
    },
  }
}

describe('MetricsCollector', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('accumulates time per stage', async () => {
    const now = vi.spyOn(performance, 'now')
    now.mockReturnValueOnce(0).mockReturnValueOnce(4)
    now.mockReturnValueOnce(10).mockReturnValueOnce(16)
    now.mockReturnValueOnce(20).mockReturnValueOnce(21)

    const metrics = new MetricsCollector('test-run')
    expect(metrics.record('validate', () => 'ok')).toBe('ok')
    await expect(metrics.recordAsync('persist', async () => 3)).resolves.toBe(3)
    metrics.record('validate', () => undefined)
    metrics.recordBatch(50)

    expect(metrics.getMetrics()).toEqual({
      runName: 'test-run',
      batches: 1,
      recordsProcessed: 50,
      stageTimeMs: { read: 0, validate: 5, derive: 0, persist: 6 },
    })
  })

  it('prints a stage breakdown without dividing by zero', () => {
    const { logger, lines } = createRecordingLogger()
    new MetricsCollector('empty-run').printSummary(logger)

    expect(lines[0]).toBe('=== empty-run metrics ===')
    expect(lines[1]).toBe('Batches: 0, records read: 0')
    expect(lines).toContain('  persist: 0.00ms (0.0%)')
    expect(lines).toHaveLength(6)
  })
})
