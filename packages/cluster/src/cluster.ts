import { availableParallelism } from 'node:os'
import { makeLogger, type Logger } from '@fanout/logger'
import { InMemoryQueue } from '@fanout/queue'
import { EXECUTOR_CONSTANTS } from '@fanout/utils'
import { v4 } from 'uuid'
import { ClusterError } from './errors.js'
import { Future } from './future.js'
import { abandonTask, runTask, type QueuedTask } from './execute.js'
import { WorkerHandle } from './worker.js'
import type { Task, TaskOptions, TaskSummary } from './types.js'

export interface LocalClusterOptions {
  numCpus?: number
  name?: string
}

const registry = new Map<string, LocalCluster>()

/**
 * In-process cluster. Tasks queue FIFO and run on `numCpus` slots; each
 * worker created through `createWorker` has its own one-at-a-time mailbox.
 */
export class LocalCluster {
  public readonly address: string
  public readonly numCpus: number
  public readonly name: string
  private readonly logger: Logger
  private readonly tasks = new InMemoryQueue<QueuedTask<unknown>>('LocalCluster tasks')
  private readonly live = new Map<string, Future<unknown>>()
  private readonly workers: WorkerHandle[] = []
  private stopped = false

  constructor(options: LocalClusterOptions = {}) {
    this.address = `${EXECUTOR_CONSTANTS.ADDRESS_SCHEME}${v4()}`
    this.numCpus = options.numCpus ?? availableParallelism()
    this.name = options.name ?? 'local'
    this.logger = makeLogger('LocalCluster', { address: this.address, clusterName: this.name })

    for (let slot = 0; slot < this.numCpus; slot++) {
      this.tasks.onMessage(async (messageId, task) => {
        await runTask(task, this.logger)
        this.tasks.ack(messageId)
      })
    }
    this.logger.info(`cluster started`, { numCpus: this.numCpus })
  }

  isStopped(): boolean {
    return this.stopped
  }

  submit<R>(fn: Task<R>, options: TaskOptions = {}): Future<R> {
    this.ensureRunning()
    const future = new Future<R>(options.name ?? EXECUTOR_CONSTANTS.DEFAULT_TASK_NAME)
    const taskId = v4()
    this.live.set(taskId, future)
    future.addDoneCallback(() => this.live.delete(taskId))
    this.tasks.enqueue({ taskId, fn, future })
    this.logger.trace(`task submitted`, { taskId, name: future.name })
    return future
  }

  createWorker(name?: string): WorkerHandle {
    this.ensureRunning()
    const worker = new WorkerHandle(name ?? `worker-${this.workers.length + 1}`)
    this.workers.push(worker)
    return worker
  }

  /** Tasks that are queued or running. */
  listTasks(): TaskSummary[] {
    const out: TaskSummary[] = []
    for (const [taskId, future] of this.live) {
      if (future.state === 'PENDING' || future.state === 'RUNNING') {
        out.push({ taskId, name: future.name, state: future.state })
      }
    }
    return out
  }

  stop(): void {
    if (this.stopped) return
    this.stopped = true
    registry.delete(this.address)

    const waiting = this.tasks.close()
    for (const task of waiting) abandonTask(task, `cluster ${this.address} stopped`)
    for (const worker of this.workers) worker.kill()
    this.logger.info(`cluster stopped`, { abandoned: waiting.length, workers: this.workers.length })
  }

  private ensureRunning() {
    if (this.stopped) {
      throw new ClusterError('UNAVAILABLE', `cluster ${this.address} is stopped`)
    }
  }
}

/** Starts a cluster and registers it so runtimes can attach to it by address. */
export function startCluster(options: LocalClusterOptions = {}): LocalCluster {
  const cluster = new LocalCluster(options)
  registry.set(cluster.address, cluster)
  return cluster
}

export function findCluster(address: string): LocalCluster | undefined {
  return registry.get(address)
}
