import { open, stat } from 'node:fs/promises'
import { StringDecoder } from 'node:string_decoder'

import { getLogger } from '../log/logger.js'
import { safeOrUndefined } from '../log/safe.js'

import { splitCompleteLines } from './split-lines.js'
import { waitForAbort } from './wait.js'

import type { Logger } from 'pino'

export const DEFAULT_POLL_MS = 1_000
export const DEFAULT_CHUNK_BYTES = 64 * 1024

export type ReadLinesOptions = {
  signal?: AbortSignal
  pollMs?: number
  chunkBytes?: number
  logger?: Logger
}

const isFile = async (path: string, logger: Logger): Promise<boolean> => {
  const stats = await safeOrUndefined(
    'readLinesContinuous: stat',
    () => stat(path),
    { ignoreCodes: ['ENOENT', 'ENOTDIR'], meta: { path }, logger },
  )
  return stats?.isFile() ?? false
}

/**
 * Follow a text file as it grows, yielding each batch of newly completed
 * lines without their `\n` terminators.
 *
 * Waits for the file to appear first. Running out of bytes is not the end of
 * the stream: the reader sleeps `pollMs` and tries again until `signal`
 * aborts. A trailing line with no newline yet is held back until a later read
 * completes it, and is dropped if the signal aborts first. Every call starts
 * from the beginning of the file.
 */
export async function* readLinesContinuous(
  path: string,
  options: ReadLinesOptions = {},
): AsyncGenerator<string[], void, undefined> {
  const signal = options.signal ?? new AbortController().signal
  const pollMs = options.pollMs ?? DEFAULT_POLL_MS
  const chunkBytes = options.chunkBytes ?? DEFAULT_CHUNK_BYTES
  const logger = options.logger ?? getLogger('tailer')

  while (!(await isFile(path, logger))) {
    logger.debug({ path }, 'file does not exist yet, waiting for creation')
    await waitForAbort({ signal, timeoutMs: pollMs })
    if (signal.aborted) {
      logger.debug({ path }, 'cancelled before file appeared')
      return
    }
  }

  const handle = await open(path, 'r')
  const decoder = new StringDecoder('utf8')
  const buffer = Buffer.alloc(chunkBytes)
  let position = 0
  let partial = ''
  try {
    while (!signal.aborted) {
      const { bytesRead } = await handle.read(buffer, 0, chunkBytes, position)
      if (bytesRead === 0) {
        await waitForAbort({ signal, timeoutMs: pollMs })
        continue
      }
      position += bytesRead
      const { lines, rest } = splitCompleteLines(
        partial + decoder.write(buffer.subarray(0, bytesRead)),
      )
      partial = rest
      if (partial) logger.trace({ path, partial }, 'buffering partial line')
      if (lines.length > 0) {
        logger.trace({ path, count: lines.length }, 'read lines')
        yield lines
      }
    }
    logger.debug({ path, position }, 'reader cancelled')
  } finally {
    await handle.close()
  }
}
