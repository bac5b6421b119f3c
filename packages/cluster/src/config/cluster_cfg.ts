import { makeLogger } from '@fanout/logger'
import { ClusterError } from '../errors.js'
import {
  ClusterInitConfigSchema,
  type ClusterInitConfig,
  type ResolvedClusterConfig,
} from '../types.js'

const logger = makeLogger('clusterConfig')

/** Cluster settings from the environment; explicit `overrides` win. */
export function getClusterConfig(overrides: ClusterInitConfig = {}): ResolvedClusterConfig {
  const address = overrides.address ?? process.env.FANOUT_ADDRESS
  logger.trace(`address: ${address ?? '<start local>'}`)
  const numCpus = overrides.numCpus ?? process.env.FANOUT_NUM_CPUS
  logger.trace(`numCpus: ${numCpus ?? '<available parallelism>'}`)

  const parsed = ClusterInitConfigSchema.safeParse({ ...overrides, address, numCpus })
  if (!parsed.success) {
    throw new ClusterError('VALIDATION', 'invalid cluster config', parsed.error.issues)
  }
  return parsed.data
}
