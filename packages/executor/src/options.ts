import { z } from 'zod'
import type { ClusterInitConfig, ClusterRuntime } from '@fanout/cluster'
import { ExecutorError } from './errors.js'

export const ExecutorSettingsSchema = z.object({
  // unset: the cluster sizes parallelism by its own slots
  maxWorkers: z.number().int().min(1).optional(),
  shutdownCluster: z.boolean().default(false),
})

export type ExecutorSettings = z.output<typeof ExecutorSettingsSchema>

export interface ExecutorOptions extends ClusterInitConfig {
  /** Bound parallelism to a fixed pool of this many workers. */
  maxWorkers?: number
  /**
   * When false, `shutdown()` leaves the cluster running so the next executor
   * can reuse it. Futures are dropped from the executor either way.
   */
  shutdownCluster?: boolean
  /** Defaults to the process-wide `clusterRuntime`. */
  runtime?: ClusterRuntime
}

export const MapOptionsSchema = z.object({
  timeoutMs: z.number().nonnegative().optional(), // budget for the whole result sequence
  chunksize: z.number().int().min(1).default(1), // accepted for call compatibility, has no effect
})

export type MapOptions = z.input<typeof MapOptionsSchema>

export interface ShutdownOptions {
  /** Wait for running futures before tearing the cluster down. */
  wait?: boolean
  /** Cancel futures that have not started yet. */
  cancelPending?: boolean
}

export function parseSettings(input: { maxWorkers?: number; shutdownCluster?: boolean }): ExecutorSettings {
  const parsed = ExecutorSettingsSchema.safeParse(input)
  if (parsed.success) return parsed.data

  const maxWorkersIssue = parsed.error.issues.find((issue) => issue.path[0] === 'maxWorkers')
  const message = maxWorkersIssue
    ? `\`maxWorkers=${String(input.maxWorkers)}\` is given. The argument \`maxWorkers\` must be an integer >= 1`
    : 'invalid executor options'
  throw new ExecutorError('INVALID_ARGUMENT', message, parsed.error.issues)
}

export function parseMapOptions(input: MapOptions): z.output<typeof MapOptionsSchema> {
  const parsed = MapOptionsSchema.safeParse(input)
  if (!parsed.success) {
    throw new ExecutorError('INVALID_ARGUMENT', 'invalid map options', parsed.error.issues)
  }
  return parsed.data
}
