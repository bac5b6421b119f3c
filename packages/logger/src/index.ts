import pino from 'pino'
import { config } from 'dotenv'
config()

type Level = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'
export interface Logger {
  child(bindings?: Record<string, unknown>): Logger
  fatal(msg: string, meta?: Record<string, unknown>): void
  error(msg: string, meta?: Record<string, unknown>): void
  warn(msg: string, meta?: Record<string, unknown>): void
  info(msg: string, meta?: Record<string, unknown>): void
  debug(msg: string, meta?: Record<string, unknown>): void
  trace(msg: string, meta?: Record<string, unknown>): void
}

const isProd = process.env.NODE_ENV === 'production'
const pretty = !isProd && process.env.LOG_PRETTY !== 'false'

const root = pino({
  level: process.env.LOG_LEVEL ?? 'trace',
  base: null,
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: { colorize: true, singleLine: true, translateTime: 'SYS:HH:MM:ss.l' },
      }
    : undefined,
})

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

function wrap(instance: pino.Logger): Logger {
  const emit =
    (lvl: Level) =>
    (msg: string, meta?: Record<string, unknown>): void => {
      instance[lvl](meta ?? {}, msg)
    }

  const [fatal, error, warn, info, debug, trace] = LEVELS.map(emit)

  return {
    child: (bindings) => wrap(instance.child(bindings ?? {})),
    fatal,
    error,
    warn,
    info,
    debug,
    trace,
  }
}

export const logger: Logger = wrap(root)

export function makeLogger(service: string, bindings?: Record<string, unknown>): Logger {
  return logger.child({ service, ...(bindings ?? {}) })
}

/** Flattens an unknown thrown value into log metadata. */
export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name }
  }
  return { error: String(err) }
}
