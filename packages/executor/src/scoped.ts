import { ClusterExecutor } from './executor.js'
import type { ExecutorOptions } from './options.js'

/**
 * Runs `body` with a fresh executor and shuts it down on every exit path,
 * including a throwing body.
 */
export async function withExecutor<T>(
  options: ExecutorOptions,
  body: (executor: ClusterExecutor) => T | PromiseLike<T>,
): Promise<T> {
  const executor = new ClusterExecutor(options)
  try {
    return await body(executor)
  } finally {
    await executor.shutdown()
  }
}
