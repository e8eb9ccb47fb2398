import pino, { type DestinationStream, type Logger } from 'pino'

import { LOG_SCHEMA, openRotatingLog } from './rotating-log.js'

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type { Logger } from 'pino'

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value)

const envLevel = (): LogLevel => {
  const raw = process.env.RECORD_TAIL_LOG_LEVEL?.trim().toLowerCase()
  if (!raw) return 'info'
  if (isLogLevel(raw)) return raw
  console.warn('[log] invalid RECORD_TAIL_LOG_LEVEL:', raw)
  return 'info'
}

export const createLogger = (
  level: LogLevel,
  destination: DestinationStream = pino.destination(2),
): Logger =>
  pino(
    {
      base: { schema: LOG_SCHEMA },
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  )

let rootLogger: Logger | undefined

const getRootLogger = (): Logger => {
  rootLogger ??= createLogger(envLevel())
  return rootLogger
}

/**
 * Child of the process-wide logger. Components resolve it when they are
 * constructed, so call `configureLogging` before building the registry.
 */
export const getLogger = (component: string): Logger =>
  getRootLogger().child({ component })

export const configureLogging = async (options: {
  level: LogLevel
  file?: string
}): Promise<Logger> => {
  if (options.file) {
    const { stream } = await openRotatingLog(options.file)
    rootLogger = createLogger(options.level, stream)
  } else {
    rootLogger = createLogger(options.level)
  }
  return rootLogger
}
