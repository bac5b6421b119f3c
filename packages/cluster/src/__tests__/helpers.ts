// lets every pending microtask run, including queue dispatch and task bodies
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve))

export interface Gate {
  opened: Promise<void>
  open(): void
}

export function gate(): Gate {
  let release: () => void = () => undefined
  const opened = new Promise<void>((resolve) => {
    release = resolve
  })
  return { opened, open: () => release() }
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}
