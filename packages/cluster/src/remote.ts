import { taskName } from '@fanout/utils'
import type { Future } from './future.js'
import type { LocalCluster } from './cluster.js'
import type { TaskOptions } from './types.js'

/**
 * A function bound to a cluster. `remote(...args)` schedules one call and
 * returns its future; `options` returns a copy with different task options.
 */
export class RemoteFunction<A extends unknown[], R> {
  constructor(
    private readonly resolveCluster: () => LocalCluster,
    private readonly fn: (...args: A) => R | PromiseLike<R>,
    private readonly taskOptions: TaskOptions = {},
  ) {}

  options(taskOptions: TaskOptions): RemoteFunction<A, R> {
    return new RemoteFunction(this.resolveCluster, this.fn, { ...this.taskOptions, ...taskOptions })
  }

  remote(...args: A): Future<R> {
    const name = this.taskOptions.name ?? taskName(this.fn)
    return this.resolveCluster().submit(() => this.fn(...args), { ...this.taskOptions, name })
  }
}
