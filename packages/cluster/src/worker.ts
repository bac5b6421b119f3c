import { makeLogger, type Logger } from '@fanout/logger'
import { InMemoryQueue } from '@fanout/queue'
import { v4 } from 'uuid'
import { ClusterError } from './errors.js'
import { Future } from './future.js'
import { abandonTask, runTask, type QueuedTask } from './execute.js'
import type { Task } from './types.js'

/**
 * A long-lived worker. Calls run one at a time, in the order they were invoked.
 */
export class WorkerHandle {
  public readonly id: string
  private readonly logger: Logger
  private readonly mailbox: InMemoryQueue<QueuedTask<unknown>>
  private alive = true

  constructor(public readonly name: string) {
    this.id = v4()
    this.logger = makeLogger('Worker', { workerId: this.id, workerName: name })
    this.mailbox = new InMemoryQueue(`Worker ${name} mailbox`)
    this.mailbox.onMessage(async (messageId, task) => {
      await runTask(task, this.logger)
      this.mailbox.ack(messageId)
    })
  }

  isAlive(): boolean {
    return this.alive
  }

  /** Number of calls queued or in progress on this worker. */
  backlog(): number {
    return this.mailbox.size()
  }

  invoke<R>(fn: Task<R>, name?: string): Future<R> {
    if (!this.alive) {
      throw new ClusterError('UNAVAILABLE', `worker "${this.name}" was killed`, { workerId: this.id })
    }
    const future = new Future<R>(name ?? this.name)
    const taskId = v4()
    this.mailbox.enqueue({ taskId, fn, future })
    this.logger.trace(`invoke`, { taskId, backlog: this.mailbox.size() })
    return future
  }

  kill(): void {
    if (!this.alive) return
    this.alive = false
    const waiting = this.mailbox.close()
    for (const task of waiting) abandonTask(task, `worker "${this.name}" was killed`)
    this.logger.debug(`killed`, { abandoned: waiting.length })
  }
}
