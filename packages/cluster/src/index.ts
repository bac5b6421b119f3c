export * from './errors.js'
export * from './future.js'
export * from './wait.js'
export * from './types.js'
export * from './worker.js'
export * from './cluster.js'
export * from './pool.js'
export * from './remote.js'
export * from './runtime.js'
export { getClusterConfig } from './config/cluster_cfg.js'
