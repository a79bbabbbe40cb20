import { describe, expect, it } from 'vitest'
import { parallelMap } from './parallel.js'

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

describe('parallelMap', () => {
  it('keeps input order whatever the completion order', async () => {
    const results = await parallelMap(
      [30, 10, 20],
      async (ms, index) => {
        await delay(ms)
        return `${index}:${ms}`
      },
      3
    )

    expect(results).toEqual(['0:30', '1:10', '2:20'])
  })

  it('never runs more than the given number of calls at once', async () => {
    let active = 0
    let peak = 0

    await parallelMap(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active += 1
        peak = Math.max(peak, active)
        await delay(5)
        active -= 1
      },
      2
    )

    expect(peak).toBe(2)
  })

  it('handles empty input and non-positive concurrency', async () => {
    expect(await parallelMap([], async (value: number) => value, 4)).toEqual([])
    expect(await parallelMap([1, 2], async (value) => value * 2, 0)).toEqual([2, 4])
  })
})
