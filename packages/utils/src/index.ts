import { performance } from 'node:perf_hooks'

export const EXECUTOR_CONSTANTS = {
  DEFAULT_TASK_NAME: 'anonymous',
  ADDRESS_SCHEME: 'local://',
}

/** Monotonic milliseconds, unaffected by wall-clock adjustments. */
export const nowMs = (): number => performance.now()

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })

/** Longest delay a single Node timer honours; larger ones fire after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1

/**
 * Calls `onFire` once `ms` have passed, re-arming in MAX_TIMER_MS steps for
 * longer delays. A non-finite delay never fires. Returns a canceller.
 */
export function startTimer(ms: number, onFire: () => void): () => void {
  let handle: NodeJS.Timeout | undefined
  const arm = (left: number) => {
    const step = Math.min(left, MAX_TIMER_MS)
    handle = setTimeout(() => (left > step ? arm(left - step) : onFire()), step)
  }
  if (Number.isFinite(ms)) arm(ms)
  return () => clearTimeout(handle)
}

/** Milliseconds left until `deadline`, or undefined when there is no deadline. */
export const remainingMs = (deadline: number | undefined): number | undefined =>
  deadline === undefined ? undefined : deadline - nowMs()

export type IterablesOf<A extends unknown[]> = { [K in keyof A]: Iterable<A[K]> }

/**
 * Positional zip; stops at the shortest input. Inputs are consumed lazily,
 * one element from each per step.
 */
export function* zip<A extends unknown[]>(iterables: IterablesOf<A>): Generator<A> {
  const iterators: Iterator<unknown>[] = []
  for (const iterable of iterables) iterators.push(iterable[Symbol.iterator]())
  if (iterators.length === 0) return

  while (true) {
    const row: unknown[] = []
    for (const it of iterators) {
      const step = it.next()
      if (step.done) return
      row.push(step.value)
    }
    // row[i] was drawn from iterables[i], so it matches A positionally
    yield row as A
  }
}

export const taskName = (fn: { name: string }): string =>
  fn.name.length > 0 ? fn.name : EXECUTOR_CONSTANTS.DEFAULT_TASK_NAME
