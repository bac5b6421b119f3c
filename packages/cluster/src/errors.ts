export type ClusterErrorCode =
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'INVALID_STATE'
  | 'NOT_FOUND'
  | 'UNAVAILABLE'
  | 'VALIDATION'
  | 'NO_RESULTS'

export class ClusterError extends Error {
  constructor(
    public readonly code: ClusterErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'ClusterError'
  }
}

export const isClusterError = (err: unknown, code?: ClusterErrorCode): err is ClusterError =>
  err instanceof ClusterError && (code === undefined || err.code === code)
