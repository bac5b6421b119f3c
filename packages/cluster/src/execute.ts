import type { Logger } from '@fanout/logger'
import { ClusterError } from './errors.js'
import type { Future, Outcome } from './future.js'
import type { Task } from './types.js'

export interface QueuedTask<R> {
  taskId: string
  fn: Task<R>
  future: Future<R>
}

/**
 * Runs one queued task to completion. Cancelled tasks are skipped; the task's
 * own error becomes the future's exception unchanged.
 */
export async function runTask<R>(task: QueuedTask<R>, logger: Logger): Promise<void> {
  const { future, taskId } = task
  if (future.state !== 'PENDING' && future.state !== 'CANCELLED') {
    logger.warn(`task future already ${future.state}, not running it`, { taskId, name: future.name })
    return
  }
  if (!future.setRunningOrNotifyCancel()) {
    logger.trace(`skip cancelled task`, { taskId, name: future.name })
    return
  }

  logger.trace(`task started`, { taskId, name: future.name })
  let outcome: Outcome<R>
  try {
    outcome = { ok: true, value: await task.fn() }
  } catch (err) {
    outcome = { ok: false, error: err }
  }

  if (future.done()) {
    logger.warn(`task future settled elsewhere, dropping outcome`, { taskId, name: future.name })
    return
  }
  if (outcome.ok) future.setResult(outcome.value)
  else future.setException(outcome.error)
  logger.trace(`task finished`, { taskId, name: future.name, ok: outcome.ok })
}

/** Fails a task that never got to run because its executor went away. */
export function abandonTask<R>(task: QueuedTask<R>, reason: string): void {
  if (task.future.done()) return
  task.future.setException(new ClusterError('UNAVAILABLE', reason, { taskId: task.taskId }))
}
