import { followRecords } from '../listener/follow.js'
import { rawLinesKind } from '../parsers/raw-lines.js'
import { spotFindingKind, toSpotResult } from '../parsers/spot-finding.js'
import { WatcherRegistry } from '../watcher/registry.js'

import type { TailArgs } from './args.js'
import type { AppConfig } from '../config.js'
import type { Listener } from '../listener/listener.js'
import type { Logger } from 'pino'

export type TailOutcome = {
  records: number
  status: 'idle' | 'aborted' | 'failed'
}

export const createTailRegistry = (config: AppConfig, logger?: Logger) =>
  new WatcherRegistry(
    { 'spot-finding': spotFindingKind, 'raw-lines': rawLinesKind },
    { config, ...(logger ? { logger } : {}) },
  )

export type TailRegistry = ReturnType<typeof createTailRegistry>

const drain = async <T>(params: {
  listener: Listener<T>
  format: (record: T) => unknown
  write: (line: string) => void
  idleTimeoutMs: number
  signal: AbortSignal
}): Promise<number> => {
  let count = 0
  for await (const records of followRecords(params.listener, {
    idleTimeoutMs: params.idleTimeoutMs,
    signal: params.signal,
  })) {
    for (const record of records)
      params.write(`${JSON.stringify(params.format(record))}\n`)
    count += records.length
  }
  return count
}

export const runTail = async (params: {
  args: TailArgs
  config: AppConfig
  registry: TailRegistry
  write: (line: string) => void
  signal: AbortSignal
}): Promise<TailOutcome> => {
  const { args, config, registry, write, signal } = params
  const watcher = registry.getOrCreate(args.kind, args.path)
  // ends the drain on caller abort or as soon as the watcher stops or fails
  const controller = new AbortController()
  const abort = () => controller.abort()
  signal.addEventListener('abort', abort, { once: true })
  if (signal.aborted) abort()
  void watcher.done.then(abort)

  const shared = {
    write,
    idleTimeoutMs: config.listener.idleTimeoutMs,
    signal: controller.signal,
  }
  try {
    const records =
      args.kind === 'raw-lines'
        ? await drain({
            ...shared,
            listener: registry.listen('raw-lines', args.path, {
              offset: args.from,
            }),
            format: (line) => line,
          })
        : await drain({
            ...shared,
            listener: registry.listen('spot-finding', args.path, {
              offset: args.from,
            }),
            format: toSpotResult,
          })
    if (watcher.status === 'failed') return { records, status: 'failed' }
    return { records, status: controller.signal.aborted ? 'aborted' : 'idle' }
  } finally {
    signal.removeEventListener('abort', abort)
  }
}
