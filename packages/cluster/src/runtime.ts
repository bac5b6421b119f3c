import { makeLogger } from '@fanout/logger'
import { getClusterConfig } from './config/cluster_cfg.js'
import { ClusterError } from './errors.js'
import { findCluster, startCluster, type LocalCluster } from './cluster.js'
import { RemoteFunction } from './remote.js'
import type { WorkerHandle } from './worker.js'
import type { ClusterContext, ClusterInitConfig } from './types.js'

interface Connection {
  cluster: LocalCluster
  context: ClusterContext
}

/**
 * Explicit handle to one cluster connection.
 *
 * `init` is idempotent: once connected, later calls return the same context,
 * which lets several executors share a cluster. `shutdown` stops a cluster
 * this runtime started and detaches from one it attached to.
 */
export class ClusterRuntime {
  private readonly logger = makeLogger('ClusterRuntime')
  private connection: Connection | undefined

  isInitialized(): boolean {
    return this.connection !== undefined
  }

  init(config: ClusterInitConfig = {}): ClusterContext {
    if (this.connection) {
      this.logger.debug(`init: already connected`, { address: this.connection.context.address })
    }
    return this.connect(config).context
  }

  /** The connected cluster; connects with default settings on first use. */
  get cluster(): LocalCluster {
    return this.connect().cluster
  }

  get context(): ClusterContext | undefined {
    return this.connection?.context
  }

  remote<A extends unknown[], R>(fn: (...args: A) => R | PromiseLike<R>): RemoteFunction<A, R> {
    return new RemoteFunction(() => this.cluster, fn)
  }

  createWorker(name?: string): WorkerHandle {
    return this.cluster.createWorker(name)
  }

  shutdown(): void {
    const connection = this.connection
    if (!connection) return
    this.connection = undefined
    if (connection.context.attached) {
      this.logger.info(`shutdown: detached`, { address: connection.context.address })
      return
    }
    connection.cluster.stop()
    this.logger.info(`shutdown: stopped cluster`, { address: connection.context.address })
  }

  private connect(config: ClusterInitConfig = {}): Connection {
    if (this.connection) return this.connection

    const resolved = getClusterConfig(config)
    let cluster: LocalCluster
    let attached: boolean
    if (resolved.address) {
      const existing = findCluster(resolved.address)
      if (!existing) {
        throw new ClusterError('NOT_FOUND', `no cluster at ${resolved.address}`)
      }
      cluster = existing
      attached = true
    } else {
      cluster = startCluster({ numCpus: resolved.numCpus, name: resolved.name })
      attached = false
    }

    const context: ClusterContext = { address: cluster.address, numCpus: cluster.numCpus, attached }
    this.connection = { cluster, context }
    this.logger.info(`init: ${attached ? 'attached to' : 'started'} cluster`, { ...context })
    return this.connection
  }
}

export const clusterRuntime = new ClusterRuntime()
