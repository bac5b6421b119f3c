import {
  clusterRuntime,
  isClusterError,
  waitAny,
  WorkerPool,
  type ClusterContext,
  type ClusterRuntime,
  type Future,
} from '@fanout/cluster'
import { makeLogger, type Logger } from '@fanout/logger'
import { nowMs, remainingMs, taskName, zip, type IterablesOf } from '@fanout/utils'
import { ExecutorError } from './errors.js'
import {
  parseMapOptions,
  parseSettings,
  type ExecutorOptions,
  type MapOptions,
  type ShutdownOptions,
} from './options.js'

type Callable<A extends unknown[], R> = (...args: A) => R | PromiseLike<R>

function asExecutorTimeout(err: unknown): unknown {
  if (isClusterError(err, 'TIMEOUT')) {
    return new ExecutorError('TIMEOUT', 'map results were not ready before the deadline', err)
  }
  return err
}

async function resultOrCancel<R>(future: Future<R>, timeoutMs?: number): Promise<R> {
  try {
    return await future.result(timeoutMs)
  } catch (err) {
    throw asExecutorTimeout(err)
  } finally {
    future.cancel()
  }
}

/**
 * Executor that runs submitted calls on a cluster and hands back futures.
 *
 * Without `maxWorkers` every call is an independent cluster task and the
 * cluster decides how many run at once. With `maxWorkers` the executor owns a
 * pool of that many workers and calls queue for the next idle one.
 *
 * Usage:
 *
 *   await withExecutor({ maxWorkers: 2 }, async (ex) => {
 *     const f = ex.submit((x: number) => x * x, 100)
 *     await f.result() // 10000
 *   })
 */
export class ClusterExecutor {
  public readonly context: ClusterContext
  public readonly maxWorkers: number | undefined
  public readonly pool: WorkerPool | undefined
  /** Whether `shutdown()` also tears the cluster down. */
  public shutdownCluster: boolean

  private readonly logger: Logger
  private readonly runtime: ClusterRuntime
  private shutdownLock = false
  private futures: Array<Future<unknown>> = []

  constructor(options: ExecutorOptions = {}) {
    const { maxWorkers, shutdownCluster, runtime, ...clusterConfig } = options
    const settings = parseSettings({ maxWorkers, shutdownCluster })

    this.runtime = runtime ?? clusterRuntime
    this.shutdownCluster = settings.shutdownCluster
    this.maxWorkers = settings.maxWorkers
    this.context = this.runtime.init(clusterConfig)
    this.logger = makeLogger('ClusterExecutor', { address: this.context.address })

    if (settings.maxWorkers !== undefined) {
      const workers = Array.from({ length: settings.maxWorkers }, (_, i) =>
        this.runtime.createWorker(`executor-worker-${i + 1}`),
      )
      this.pool = new WorkerPool(workers)
    }
    this.logger.debug(`executor ready`, {
      maxWorkers: this.maxWorkers ?? null,
      shutdownCluster: this.shutdownCluster,
    })
  }

  /** True once a cluster-destroying shutdown has run. */
  isShutdown(): boolean {
    return this.shutdownLock
  }

  /** Futures issued since the last shutdown. */
  outstanding(): ReadonlyArray<Future<unknown>> {
    return this.futures
  }

  /**
   * Schedules `fn(...args)` and returns its future. The future settles with
   * the return value, or with the error `fn` threw.
   */
  submit<A extends unknown[], R>(fn: Callable<A, R>, ...args: A): Future<R> {
    this.checkShutdownLock()
    const name = taskName(fn)

    let future: Future<R>
    if (this.pool) {
      future = this.pool.dispatch((worker) => worker.invoke(() => fn(...args), name), undefined, name)
    } else {
      future = this.runtime.remote(fn).options({ name }).remote(...args)
    }

    this.futures.push(future)
    return future
  }

  /**
   * Calls `fn` once per positional tuple of `iterables` (shortest input wins).
   * Every call is submitted before this method returns.
   *
   * With a worker pool results come back in completion order; without one
   * they come back in submission order, and abandoning the iterator cancels
   * whatever has not started. `timeoutMs` bounds the whole sequence.
   *
   * @throws ExecutorError TIMEOUT from the iterator once the budget is spent.
   */
  map<A extends unknown[], R>(
    fn: Callable<A, R>,
    iterables: IterablesOf<A>,
    options: MapOptions = {},
  ): AsyncGenerator<R> {
    this.checkShutdownLock()
    const { timeoutMs } = parseMapOptions(options)
    // an infinite budget is no deadline at all
    const deadline =
      timeoutMs === undefined || !Number.isFinite(timeoutMs) ? undefined : nowMs() + timeoutMs

    const futures: Array<Future<R>> = []
    for (const args of zip(iterables)) futures.push(this.submit(fn, ...args))
    this.logger.trace(`map submitted`, { count: futures.length, pooled: this.pool !== undefined })

    return this.pool ? this.completionOrder(futures, deadline) : this.submissionOrder(futures, deadline)
  }

  async shutdown({ wait = true, cancelPending = false }: ShutdownOptions = {}): Promise<void> {
    if (this.shutdownCluster) {
      this.shutdownLock = true

      if (cancelPending) {
        const cancelled = this.futures.filter((f) => f.cancel()).length
        this.logger.debug(`cancelled pending futures`, { cancelled, total: this.futures.length })
      }

      if (wait) {
        for (const future of this.futures) {
          if (future.running()) await future.wait()
        }
      }
      this.runtime.shutdown()
    }
    this.futures = []
    this.logger.debug(`shutdown`, { clusterStopped: this.shutdownCluster })
  }

  private async *completionOrder<R>(futures: Array<Future<R>>, deadline?: number): AsyncGenerator<R> {
    let outstanding = futures
    while (outstanding.length > 0) {
      let next: Future<R>
      try {
        next = await waitAny(outstanding, remainingMs(deadline))
      } catch (err) {
        throw asExecutorTimeout(err)
      }
      outstanding = outstanding.filter((f) => f !== next)
      yield await next.result()
    }
  }

  private async *submissionOrder<R>(futures: Array<Future<R>>, deadline?: number): AsyncGenerator<R> {
    // reversed so that pop() walks submission order
    const pending = [...futures].reverse()
    try {
      for (let future = pending.pop(); future !== undefined; future = pending.pop()) {
        yield await resultOrCancel(future, remainingMs(deadline))
      }
    } finally {
      for (const future of pending) future.cancel()
    }
  }

  private checkShutdownLock() {
    if (this.shutdownLock) {
      throw new ExecutorError('ILLEGAL_STATE', 'New task submitted after shutdown() was called')
    }
  }
}
