import { makeLogger, type Logger } from '@fanout/logger'
import { ClusterError } from './errors.js'
import { Future } from './future.js'
import { waitAny } from './wait.js'
import type { WorkerHandle } from './worker.js'

export type PoolTask<V, R> = (worker: WorkerHandle, value: V) => Future<R>

interface PendingSubmit {
  index: number
  start: (worker: WorkerHandle) => boolean
  future: Future<unknown>
}

/**
 * Fixed set of workers. Each submission goes to the next idle worker, or
 * waits in FIFO order until one frees up.
 *
 * Results handed out by `submit` stay tracked until read back through
 * `getNext` (submission order) or `getNextUnordered` (completion order);
 * `dispatch` hands the future to the caller alone.
 */
export class WorkerPool {
  private readonly logger: Logger = makeLogger('WorkerPool')
  private readonly workers: WorkerHandle[]
  private idle: WorkerHandle[]
  private pending: PendingSubmit[] = []
  private futureToWorker = new Map<Future<unknown>, WorkerHandle>()
  private indexToFuture = new Map<number, Future<unknown>>()
  private nextTaskIndex = 0
  private nextReturnIndex = 0

  constructor(workers: WorkerHandle[]) {
    if (workers.length === 0) {
      throw new ClusterError('VALIDATION', 'a worker pool needs at least one worker')
    }
    this.workers = [...workers]
    this.idle = [...workers]
  }

  get size(): number {
    return this.workers.length
  }

  get idleCount(): number {
    return this.idle.length
  }

  hasFree(): boolean {
    return this.idle.length > 0 && this.pending.length === 0
  }

  /** Worker currently running `future`, if it has been assigned one. */
  workerFor(future: Future<unknown>): WorkerHandle | undefined {
    return this.futureToWorker.get(future)
  }

  dispatch<V, R>(fn: PoolTask<V, R>, value: V, name?: string): Future<R> {
    const index = this.nextTaskIndex++
    const future = new Future<R>(name ?? `pool-task-${index}`)

    // true when `worker` took the call; false leaves the worker free
    const start = (worker: WorkerHandle): boolean => {
      // a submission cancelled while it waited for a worker is dropped here
      if (!future.setRunningOrNotifyCancel()) {
        this.logger.trace(`skip cancelled submission`, { index })
        return false
      }
      this.futureToWorker.set(future, worker)

      let inner: Future<R>
      try {
        inner = fn(worker, value)
      } catch (err) {
        future.setException(err)
        this.futureToWorker.delete(future)
        return false
      }

      inner.addDoneCallback((settled) => {
        const outcome = settled.outcome()
        if (outcome === undefined) {
          future.setException(new ClusterError('CANCELLED', `worker call for task ${index} was cancelled`))
        } else if (outcome.ok) {
          future.setResult(outcome.value)
        } else {
          future.setException(outcome.error)
        }
        this.futureToWorker.delete(future)
        this.release(worker)
      })
      return true
    }

    const worker = this.idle.shift()
    if (worker) {
      this.logger.trace(`assign`, { index, worker: worker.name })
      if (!start(worker)) this.release(worker)
    } else {
      this.pending.push({ index, start, future })
      this.logger.trace(`queue`, { index, pending: this.pending.length })
    }
    return future
  }

  submit<V, R>(fn: PoolTask<V, R>, value: V, name?: string): Future<R> {
    const future = this.dispatch(fn, value, name)
    this.indexToFuture.set(this.nextTaskIndex - 1, future)
    return future
  }

  hasNext(): boolean {
    return this.indexToFuture.size > 0
  }

  /** Next tracked result in submission order. */
  async getNext(timeoutMs?: number): Promise<unknown> {
    if (!this.hasNext()) throw new ClusterError('NO_RESULTS', 'no more results to get')

    while (!this.indexToFuture.has(this.nextReturnIndex)) this.nextReturnIndex++
    const index = this.nextReturnIndex
    const future = this.indexToFuture.get(index)
    if (!future) throw new ClusterError('NO_RESULTS', 'no more results to get')

    await future.wait(timeoutMs)
    this.indexToFuture.delete(index)
    this.nextReturnIndex++
    return future.result()
  }

  /** Next tracked result in completion order. */
  async getNextUnordered(timeoutMs?: number): Promise<unknown> {
    if (!this.hasNext()) throw new ClusterError('NO_RESULTS', 'no more results to get')

    const future = await waitAny([...this.indexToFuture.values()], timeoutMs)
    for (const [index, f] of this.indexToFuture) {
      if (f === future) this.indexToFuture.delete(index)
    }
    return future.result()
  }

  private release(worker: WorkerHandle) {
    while (this.pending.length > 0) {
      const next = this.pending.shift()
      if (!next) break
      if (next.future.cancelled()) continue
      this.logger.trace(`assign queued`, { index: next.index, worker: worker.name })
      if (next.start(worker)) return
    }
    this.idle.push(worker)
  }
}
