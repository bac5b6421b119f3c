import { startTimer } from '@fanout/utils'
import { ClusterError } from './errors.js'
import type { Future } from './future.js'

const byCompletion = <T>(a: Future<T>, b: Future<T>): number =>
  (a.completedSeq ?? Number.MAX_SAFE_INTEGER) - (b.completedSeq ?? Number.MAX_SAFE_INTEGER)

/**
 * Resolves with the first of `futures` to complete. When several are already
 * done, the one that completed earliest wins.
 */
export async function waitAny<T>(futures: Array<Future<T>>, timeoutMs?: number): Promise<Future<T>> {
  if (futures.length === 0) {
    throw new ClusterError('NO_RESULTS', 'waitAny needs at least one future')
  }

  const finished = futures.filter((f) => f.done()).sort(byCompletion)
  if (finished.length > 0) return finished[0]

  if (timeoutMs !== undefined && timeoutMs <= 0) {
    throw new ClusterError('TIMEOUT', `none of ${futures.length} futures done`, { timeoutMs })
  }

  return new Promise<Future<T>>((resolve, reject) => {
    let stopTimer = (): void => undefined

    const detach = () => {
      stopTimer()
      for (const f of futures) f.removeDoneCallback(onDone)
    }

    const onDone = (f: Future<T>) => {
      detach()
      resolve(f)
    }

    if (timeoutMs !== undefined) {
      stopTimer = startTimer(timeoutMs, () => {
        detach()
        reject(
          new ClusterError('TIMEOUT', `none of ${futures.length} futures done within ${timeoutMs}ms`, {
            timeoutMs,
          }),
        )
      })
    }

    for (const f of futures) f.addDoneCallback(onDone)
  })
}
