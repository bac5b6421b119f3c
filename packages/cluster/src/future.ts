import { errorMeta, makeLogger } from '@fanout/logger'
import { EXECUTOR_CONSTANTS, startTimer } from '@fanout/utils'
import { ClusterError } from './errors.js'

const logger = makeLogger('Future')

export type FutureState = 'PENDING' | 'RUNNING' | 'CANCELLED' | 'FINISHED'

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

export type DoneCallback<T> = (future: Future<T>) => void

// process-wide completion counter; lets waitAny recover completion order
let completionCounter = 0

/**
 * Handle to the outcome of one unit of cluster work.
 *
 * Lifecycle: PENDING -> RUNNING -> FINISHED, or PENDING -> CANCELLED.
 * The cluster drives the transitions through `setRunningOrNotifyCancel`,
 * `setResult` and `setException`; callers wait with `result` / `wait` and may
 * `cancel` while the work has not started.
 */
export class Future<T> {
  private _state: FutureState = 'PENDING'
  private _outcome: Outcome<T> | undefined
  private _completedSeq: number | undefined
  // listeners are kept untyped; Future<R> must stay assignable to Future<unknown>
  private callbacks: Array<{ listener: unknown; fire: () => void }> = []

  constructor(public readonly name: string = EXECUTOR_CONSTANTS.DEFAULT_TASK_NAME) {}

  get state(): FutureState {
    return this._state
  }

  /** Position of this future in the process-wide completion order, once done. */
  get completedSeq(): number | undefined {
    return this._completedSeq
  }

  running(): boolean {
    return this._state === 'RUNNING'
  }

  cancelled(): boolean {
    return this._state === 'CANCELLED'
  }

  done(): boolean {
    return this._state === 'CANCELLED' || this._state === 'FINISHED'
  }

  /** Returns false when the work is already running or finished. */
  cancel(): boolean {
    if (this._state === 'RUNNING' || this._state === 'FINISHED') return false
    if (this._state === 'CANCELLED') return true
    this._state = 'CANCELLED'
    this.complete()
    return true
  }

  setRunningOrNotifyCancel(): boolean {
    if (this._state === 'CANCELLED') return false
    if (this._state !== 'PENDING') {
      throw new ClusterError('INVALID_STATE', `future "${this.name}" is already ${this._state}`)
    }
    this._state = 'RUNNING'
    return true
  }

  setResult(value: T): void {
    this.finish({ ok: true, value })
  }

  setException(error: unknown): void {
    this.finish({ ok: false, error })
  }

  /** Synchronous peek at a finished outcome. */
  outcome(): Outcome<T> | undefined {
    return this._outcome
  }

  async wait(timeoutMs?: number): Promise<void> {
    if (this.done()) return
    if (timeoutMs !== undefined && timeoutMs <= 0) throw this.timeoutError(timeoutMs)

    await new Promise<void>((resolve, reject) => {
      let stopTimer = (): void => undefined
      const onDone = () => {
        stopTimer()
        resolve()
      }
      if (timeoutMs !== undefined) {
        stopTimer = startTimer(timeoutMs, () => {
          this.removeDoneCallback(onDone)
          reject(this.timeoutError(timeoutMs))
        })
      }
      this.addDoneCallback(onDone)
    })
  }

  async result(timeoutMs?: number): Promise<T> {
    await this.wait(timeoutMs)
    if (this._outcome === undefined) {
      throw new ClusterError('CANCELLED', `future "${this.name}" was cancelled`)
    }
    if (!this._outcome.ok) throw this._outcome.error
    return this._outcome.value
  }

  async exception(timeoutMs?: number): Promise<unknown> {
    await this.wait(timeoutMs)
    if (this._outcome === undefined) {
      throw new ClusterError('CANCELLED', `future "${this.name}" was cancelled`)
    }
    return this._outcome.ok ? undefined : this._outcome.error
  }

  addDoneCallback(cb: DoneCallback<T>): void {
    if (this.done()) {
      this.invoke(cb)
      return
    }
    this.callbacks.push({ listener: cb, fire: () => this.invoke(cb) })
  }

  removeDoneCallback(cb: DoneCallback<T>): void {
    this.callbacks = this.callbacks.filter((c) => c.listener !== cb)
  }

  // ---- internals ----

  private finish(outcome: Outcome<T>) {
    if (this._state !== 'PENDING' && this._state !== 'RUNNING') {
      throw new ClusterError('INVALID_STATE', `future "${this.name}" is already ${this._state}`)
    }
    this._state = 'FINISHED'
    this._outcome = outcome
    this.complete()
  }

  private complete() {
    this._completedSeq = ++completionCounter
    const pending = this.callbacks
    this.callbacks = []
    for (const { fire } of pending) fire()
  }

  private invoke(cb: DoneCallback<T>) {
    try {
      cb(this)
    } catch (err) {
      logger.error(`done callback raised`, { future: this.name, ...errorMeta(err) })
    }
  }

  private timeoutError(timeoutMs: number): ClusterError {
    return new ClusterError('TIMEOUT', `future "${this.name}" not done within ${timeoutMs}ms`, {
      timeoutMs,
    })
  }
}
