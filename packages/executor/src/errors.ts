export type ExecutorErrorCode = 'INVALID_ARGUMENT' | 'ILLEGAL_STATE' | 'TIMEOUT'

export class ExecutorError extends Error {
  constructor(
    public readonly code: ExecutorErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'ExecutorError'
  }
}
