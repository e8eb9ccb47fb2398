import { once } from 'node:events'
import { mkdir } from 'node:fs/promises'
import { basename, dirname } from 'node:path'

import pino, { type Logger } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const MAX_BYTES = 10 * 1024 * 1024
const MAX_TOTAL_BYTES = 500 * 1024 * 1024
const MAX_FILES = Math.max(1, Math.ceil(MAX_TOTAL_BYTES / MAX_BYTES))

export const LOG_SCHEMA = 'record-tail.log.v1'

export type LoggerBundle = {
  logger: Logger
  stream: RotatingFileStream
}

const bundles = new Map<string, LoggerBundle>()

const buildBundle = async (path: string): Promise<LoggerBundle> => {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })
  const stream = createStream(basename(path), {
    size: `${Math.floor(MAX_BYTES / (1024 * 1024))}M`,
    interval: '1d',
    path: dir,
    compress: 'gzip',
    maxFiles: MAX_FILES,
  })
  stream.on('error', (error) => {
    console.error('[log] stream error', error)
  })
  const logger = pino(
    {
      base: { schema: LOG_SCHEMA },
      level: 'trace',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  )
  return { logger, stream }
}

export const openRotatingLog = async (path: string): Promise<LoggerBundle> => {
  const existing = bundles.get(path)
  if (existing) return existing
  const bundle = await buildBundle(path)
  bundles.set(path, bundle)
  return bundle
}

export const closeRotatingLogs = async (): Promise<void> => {
  const open = [...bundles.values()]
  bundles.clear()
  await Promise.all(
    open.map(async ({ stream }) => {
      stream.end()
      await once(stream, 'finish')
    }),
  )
}
