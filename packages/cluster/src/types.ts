import { z } from 'zod'
import { EXECUTOR_CONSTANTS } from '@fanout/utils'

export const ClusterAddressSchema = z
  .string()
  .startsWith(EXECUTOR_CONSTANTS.ADDRESS_SCHEME, { message: 'address must use the local:// scheme' })

export const ClusterInitConfigSchema = z.object({
  address: ClusterAddressSchema.optional(), // attach to a running cluster instead of starting one
  numCpus: z.coerce.number().int().min(1).optional(), // concurrent task slots
  name: z.string().min(1).optional(),
})

export type ClusterInitConfig = z.input<typeof ClusterInitConfigSchema>
export type ResolvedClusterConfig = z.output<typeof ClusterInitConfigSchema>

export interface ClusterContext {
  address: string
  numCpus: number
  attached: boolean // true when init joined a cluster it did not start
}

export interface TaskOptions {
  name?: string
}

export type TaskState = 'PENDING' | 'RUNNING'

export interface TaskSummary {
  taskId: string
  name: string
  state: TaskState
}

export type Task<R> = () => R | PromiseLike<R>
