import { describe, it, expect } from 'vitest'
import { mapWithConcurrencyLimit } from './concurrency'

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

describe('mapWithConcurrencyLimit', () => {
  it('keeps results in input order', async () => {
    const out = await mapWithConcurrencyLimit([30, 10, 20], 3, async (ms, i) => {
      await tick(ms)
      return i
    })
    expect(out).toEqual([0, 1, 2])
  })

  it('never runs more than the limit at once', async () => {
    let active = 0
    let peak = 0
    await mapWithConcurrencyLimit([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      active++
      peak = Math.max(peak, active)
      await tick(5)
      active--
    })
    expect(peak).toBe(2)
  })

  it('returns an empty array for no items', async () => {
    expect(await mapWithConcurrencyLimit([], 4, async () => 1)).toEqual([])
  })

  it('stops starting items after a failure and lets in-flight ones settle', async () => {
    const started: number[] = []
    const finished: number[] = []
    const run = mapWithConcurrencyLimit([0, 1, 2, 3, 4], 2, async (n) => {
      started.push(n)
      if (n === 0) throw new Error('first failed')
      await tick(10)
      finished.push(n)
      return n
    })
    await expect(run).rejects.toThrow('first failed')
    expect(started).toEqual([0, 1])
    expect(finished).toEqual([1])
  })
})
