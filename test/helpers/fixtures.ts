import { appendFile, mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { z } from 'zod'

import { createLogger } from '../../src/log/logger.js'
import { createJsonRecordParser } from '../../src/parsers/json-record.js'
import { defineWatcherKind } from '../../src/parsers/types.js'

import type { Logger } from 'pino'

export const createTmpDir = (label: string) =>
  mkdtemp(join(tmpdir(), `record-tail-${label}-`))

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

export const waitFor = async (
  check: () => boolean,
  timeoutMs = 3_000,
): Promise<void> => {
  const startedAt = Date.now()
  while (!check()) {
    if (Date.now() - startedAt > timeoutMs)
      throw new Error(`condition not met within ${timeoutMs}ms`)
    await sleep(5)
  }
}

export const append = (path: string, text: string) =>
  appendFile(path, text, 'utf8')

export const silentLogger = createLogger('silent', { write: () => undefined })

export const createMemoryLogger = (): { logger: Logger; entries: unknown[] } => {
  const entries: unknown[] = []
  const logger = createLogger('debug', {
    write: (message: string) => {
      entries.push(JSON.parse(message))
    },
  })
  return { logger, entries }
}

export type Triple = readonly [n: number, total: number, filtered: number]

const tripleSchema = z.object({
  n: z.number().int(),
  total: z.number().int(),
  filtered: z.number().int(),
})

export const createTripleParser = (logger: Logger) =>
  createJsonRecordParser<z.infer<typeof tripleSchema>, Triple>({
    schema: tripleSchema,
    toRecords: (data) => [[data.n, data.total, data.filtered]],
    logger,
  })

export const tripleKind = defineWatcherKind<Triple>({
  name: 'triple',
  createParser: createTripleParser,
})

export const tripleLine = (n: number, total: number, filtered: number) =>
  `${JSON.stringify({ n, total, filtered })}\n`

const numberSchema = z.object({ n: z.number().int() })

export const createRejectingParser = (rejected: number, logger: Logger) =>
  createJsonRecordParser<z.infer<typeof numberSchema>, number>({
    schema: numberSchema,
    toRecords: (data) => {
      if (data.n === rejected) throw new Error(`cannot map ${data.n}`)
      return [data.n]
    },
    logger,
  })
