import { describe, expect, it } from 'vitest'
import { AccessQueue } from './access-queue'

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve))

describe('AccessQueue', () => {
  it('runs operations one at a time in call order', async () => {
    const queue = new AccessQueue()
    const events: string[] = []
    let releaseFirst: () => void = () => {}

    const first = queue.run(
      () =>
        new Promise<string>((resolve) => {
          events.push('first:start')
          releaseFirst = () => {
            events.push('first:end')
            resolve('a')
          }
        })
    )
    const second = queue.run(() => {
      events.push('second')
      return 'b'
    })

    await tick()
    expect(events).toEqual(['first:start'])

    releaseFirst()
    await expect(Promise.all([first, second])).resolves.toEqual(['a', 'b'])
    expect(events).toEqual(['first:start', 'first:end', 'second'])
  })

  it('keeps serving after an operation fails', async () => {
    const queue = new AccessQueue()
    const failed = queue.run(() => {
      throw new Error('boom')
    })
    const next = queue.run(() => 42)

    await expect(failed).rejects.toThrow('boom')
    await expect(next).resolves.toBe(42)
  })
})
