import { describe, it, expect, afterEach } from 'vitest'
import { clusterRuntime, ClusterRuntime, startCluster } from '@fanout/cluster'
import { sleep } from '@fanout/utils'
import { ClusterExecutor } from '../executor.js'
import { ExecutorError } from '../errors.js'
import { withExecutor } from '../scoped.js'
import { catchError, collect, range } from './helpers.js'

const multiply = (x: number, y: number) => x * y
const square = (x: number) => x * x

afterEach(() => {
  clusterRuntime.shutdown()
})

describe('ClusterExecutor.submit', () => {
  it('runs a function on the cluster', async () => {
    const result = await withExecutor({}, (ex) => ex.submit(square, 100).result())
    expect(result).toBe(10_000)
  })

  it('runs several tasks', async () => {
    await withExecutor({}, async (ex) => {
      const r0 = await ex.submit(square, 100).result()
      const r1 = await ex.submit(square, 100).result()
      expect(r0).toBe(10_000)
      expect(r1).toBe(10_000)
    })
  })

  it('runs several tasks on a worker pool', async () => {
    await withExecutor({ maxWorkers: 2 }, async (ex) => {
      const f0 = ex.submit(square, 100)
      const f1 = ex.submit(multiply, 100, 3)
      await expect(f0.result()).resolves.toBe(10_000)
      await expect(f1.result()).resolves.toBe(300)
    })
  })

  it('awaits async functions', async () => {
    await withExecutor({}, async (ex) => {
      const f = ex.submit(async (text: string) => {
        await sleep(5)
        return text.toUpperCase()
      }, 'done')
      await expect(f.result()).resolves.toBe('DONE')
    })
  })

  it("hands back the function's own error", async () => {
    const err = new TypeError('bad operand')
    await withExecutor({}, async (ex) => {
      const f = ex.submit(() => {
        throw err
      })
      await expect(f.result()).rejects.toBe(err)
    })
    await withExecutor({ maxWorkers: 1 }, async (ex) => {
      const f = ex.submit(() => {
        throw err
      })
      await expect(f.result()).rejects.toBe(err)
    })
  })

  it('names tasks after the submitted function', async () => {
    await withExecutor({}, async (ex) => {
      expect(ex.submit(square, 2).name).toBe('square')
      expect(ex.submit((x: number) => x, 2).name).toBe('anonymous')
    })
    await withExecutor({ maxWorkers: 1 }, async (ex) => {
      expect(ex.submit(square, 2).name).toBe('square')
    })
  })

  it('tracks every issued future until shutdown', async () => {
    const ex = new ClusterExecutor()
    const f = ex.submit(square, 3)
    expect(ex.outstanding()).toEqual([f])
    await ex.shutdown()
    expect(ex.outstanding()).toEqual([])
    await expect(f.result()).resolves.toBe(9)
  })
})

describe('ClusterExecutor construction', () => {
  it('builds a pool of maxWorkers idle workers', () => {
    const ex = new ClusterExecutor({ maxWorkers: 3 })
    expect(ex.maxWorkers).toBe(3)
    expect(ex.pool?.size).toBe(3)
    expect(ex.pool?.idleCount).toBe(3)
  })

  it('has no pool without maxWorkers', () => {
    const ex = new ClusterExecutor()
    expect(ex.pool).toBeUndefined()
    expect(ex.maxWorkers).toBeUndefined()
  })

  it('rejects maxWorkers below one', () => {
    const err = catchError(() => new ClusterExecutor({ maxWorkers: 0 }))
    expect(err).toBeInstanceOf(ExecutorError)
    expect(err).toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: '`maxWorkers=0` is given. The argument `maxWorkers` must be an integer >= 1',
    })
  })

  it('rejects a fractional maxWorkers', () => {
    expect(catchError(() => new ClusterExecutor({ maxWorkers: 1.5 }))).toMatchObject({
      code: 'INVALID_ARGUMENT',
    })
  })

  it('attaches to a cluster given its address', async () => {
    const cluster = startCluster({ numCpus: 2 })
    try {
      await withExecutor({ address: cluster.address, runtime: new ClusterRuntime() }, async (ex) => {
        expect(ex.context.address).toBe(cluster.address)
        expect(ex.context.attached).toBe(true)
        await expect(ex.submit(square, 100).result()).resolves.toBe(10_000)

        const results = await collect(ex.map(square, [[100, 100, 100]]))
        expect(results).toEqual([10_000, 10_000, 10_000])
      })
    } finally {
      cluster.stop()
    }
  })

  it('shares one cluster between executors that do not shut it down', async () => {
    const first = await withExecutor({}, (ex) => ex.context)
    const second = await withExecutor({}, (ex) => ex.context)
    expect(second.address).toBe(first.address)
  })
})

describe('ClusterExecutor.map', () => {
  it('zips the iterables and keeps input order without a pool', async () => {
    const results = await withExecutor({}, (ex) =>
      collect(ex.map(multiply, [
        [100, 100, 100],
        [1, 2, 3],
      ])),
    )
    expect(results).toEqual([100, 200, 300])
  })

  it('gives the same order with a pool when tasks finish in submission order', async () => {
    const unbounded = await withExecutor({}, (ex) =>
      collect(ex.map(multiply, [
        [100, 100, 100],
        [1, 2, 3],
      ])),
    )
    const pooled = await withExecutor({ maxWorkers: 2 }, (ex) =>
      collect(ex.map(multiply, [
        [100, 100, 100],
        [1, 2, 3],
      ])),
    )
    expect(pooled).toEqual(unbounded)
  })

  it('stops at the shortest iterable', async () => {
    const results = await withExecutor({}, (ex) =>
      collect(ex.map((n: number, s: string) => `${n}${s}`, [[1, 2, 3], ['a', 'b']])),
    )
    expect(results).toEqual(['1a', '2b'])
  })

  it('produces the same values with and without a pool', async () => {
    const f0 = await withExecutor({}, (ex) => collect(ex.map(square, [range(12)])))
    const f1 = await withExecutor({ maxWorkers: 1 }, (ex) => collect(ex.map(square, [range(12)])))
    const f3 = await withExecutor({ maxWorkers: 3 }, (ex) => collect(ex.map(square, [range(12)])))
    expect(f0).toEqual([0, 1, 4, 9, 16, 25, 36, 49, 64, 81, 100, 121])
    expect(f1).toEqual(f0)
    expect([...f3].sort((a, b) => a - b)).toEqual(f0)
  })

  it('yields in completion order with a pool', async () => {
    const results = await withExecutor({ maxWorkers: 3 }, (ex) =>
      collect(
        ex.map(
          async (label: string, ms: number) => {
            await sleep(ms)
            return label
          },
          [
            ['slow', 'fast', 'medium'],
            [80, 10, 40],
          ],
        ),
      ),
    )
    expect(results).toEqual(['fast', 'medium', 'slow'])
  })

  it('yields in submission order without a pool', async () => {
    const results = await withExecutor({}, (ex) =>
      collect(
        ex.map(
          async (label: string, ms: number) => {
            await sleep(ms)
            return label
          },
          [
            ['slow', 'fast', 'medium'],
            [80, 10, 40],
          ],
        ),
      ),
    )
    expect(results).toEqual(['slow', 'fast', 'medium'])
  })

  it('submits everything before the first result is read', async () => {
    await withExecutor({}, async (ex) => {
      const iterator = ex.map(square, [range(5)])
      expect(ex.outstanding()).toHaveLength(5)
      await expect(collect(iterator)).resolves.toEqual([0, 1, 4, 9, 16])
    })
  })

  it('bounds parallelism by maxWorkers', async () => {
    const nap = (_: number) => sleep(100)

    const three = await withExecutor({ maxWorkers: 3 }, async (ex) => {
      const started = performance.now()
      await collect(ex.map(nap, [range(12)]))
      return performance.now() - started
    })
    // four rounds of three
    expect(three).toBeGreaterThan(300)

    const six = await withExecutor({ maxWorkers: 6 }, async (ex) => {
      const started = performance.now()
      await collect(ex.map(nap, [range(12)]))
      return performance.now() - started
    })
    // two rounds of six
    expect(six).toBeLessThan(300)
  })

  it('keeps results readable after shutdown', async () => {
    const unbounded = await withExecutor({}, (ex) => ex.map(multiply, [[100, 100, 100], [1, 2, 3]]))
    await expect(collect(unbounded)).resolves.toEqual([100, 200, 300])

    const pooled = await withExecutor({ maxWorkers: 2 }, (ex) =>
      ex.map(multiply, [
        [100, 100, 100],
        [1, 2, 3],
      ]),
    )
    const values = await collect(pooled)
    expect(values.sort((a, b) => a - b)).toEqual([100, 200, 300])
  })

  it('times out without a pool', async () => {
    await withExecutor({}, async (ex) => {
      const slow = async (x: number) => {
        await sleep(200)
        return x
      }
      const err = await collect(ex.map(slow, [[1, 2, 3]], { timeoutMs: 50 })).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(ExecutorError)
      expect(err).toMatchObject({ code: 'TIMEOUT' })
    })
  })

  it('times out with a pool', async () => {
    await withExecutor({ maxWorkers: 2 }, async (ex) => {
      const slow = async (x: number) => {
        await sleep(200)
        return x
      }
      const err = await collect(ex.map(slow, [[1, 2, 3]], { timeoutMs: 50 })).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(ExecutorError)
      expect(err).toMatchObject({ code: 'TIMEOUT' })
    })
  })

  it('surfaces a task error from the iterator', async () => {
    const err = new Error('odd input')
    const check = (x: number) => {
      if (x % 2 === 1) throw err
      return x
    }
    await withExecutor({}, async (ex) => {
      await expect(collect(ex.map(check, [[2, 3, 4]]))).rejects.toBe(err)
    })
  })

  it.each([
    { label: 'without a pool', maxWorkers: undefined },
    { label: 'with a pool', maxWorkers: 2 },
  ])('honours very long and infinite budgets $label', async ({ maxWorkers }) => {
    const slow = async (x: number) => {
      await sleep(30)
      return x
    }
    await withExecutor({ maxWorkers }, async (ex) => {
      const unbounded = await collect(ex.map(slow, [[1, 2]], { timeoutMs: Infinity }))
      expect([...unbounded].sort()).toEqual([1, 2])

      const monthLong = await collect(ex.map(slow, [[1, 2]], { timeoutMs: 3_000_000_000 }))
      expect([...monthLong].sort()).toEqual([1, 2])
    })
  })

  it('rejects a negative timeout', async () => {
    await withExecutor({}, async (ex) => {
      expect(catchError(() => ex.map(square, [[1]], { timeoutMs: -1 }))).toMatchObject({
        code: 'INVALID_ARGUMENT',
      })
    })
  })
})
