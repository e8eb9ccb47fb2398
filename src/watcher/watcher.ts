import { getLogger } from '../log/logger.js'
import { RecordStore } from '../store/record-store.js'
import { readLinesContinuous } from '../tailer/read-lines.js'

import type { StoreConfig, TailerConfig } from '../config.js'
import type { DeltaChannel } from '../listener/delta-channel.js'
import type { RecordParser, RecordSink } from '../parsers/types.js'
import type { Logger } from 'pino'

export type WatcherStatus = 'running' | 'stopped' | 'failed'

export type WatcherOptions<T> = {
  kind: string
  path: string
  parser: RecordParser<T>
  tailer?: Partial<TailerConfig>
  store?: Partial<StoreConfig>
  logger?: Logger
}

const normalizeOffset = (value: number): number => {
  if (!Number.isFinite(value)) return 0
  return Math.max(0, Math.floor(value))
}

/**
 * Tails one file, parses each line into its store and tells every registered
 * channel how many records each batch added.
 *
 * The consume loop starts in the constructor and is the store's only writer.
 * It runs until `stop()` or a read failure; a file that never appears keeps
 * it polling.
 */
export class Watcher<T> {
  readonly kind: string
  readonly path: string
  readonly done: Promise<void>

  private readonly parser: RecordParser<T>
  private readonly store: RecordStore<T>
  private readonly channels = new Set<DeltaChannel>()
  private readonly controller = new AbortController()
  private readonly logger: Logger
  private currentStatus: WatcherStatus = 'running'
  private failure: unknown

  constructor(options: WatcherOptions<T>) {
    this.kind = options.kind
    this.path = options.path
    this.parser = options.parser
    this.store = new RecordStore<T>(options.store?.initialCapacity)
    this.logger =
      options.logger ??
      getLogger('watcher').child({ kind: options.kind, path: options.path })
    this.done = this.consume(options.tailer ?? {})
  }

  get status(): WatcherStatus {
    return this.currentStatus
  }

  get error(): unknown {
    return this.failure
  }

  get length(): number {
    return this.store.length
  }

  get listenerCount(): number {
    return this.channels.size
  }

  at(index: number): T | undefined {
    return this.store.at(index)
  }

  slice(start?: number, end?: number): T[] {
    return this.store.slice(start, end)
  }

  tail(n: number): T[] {
    return this.store.tail(n)
  }

  registerListener(channel: DeltaChannel, fromOffset = 0): void {
    this.channels.add(channel)
    const offset = normalizeOffset(fromOffset)
    const length = this.store.length
    if (offset < length) channel.push({ count: length - offset, end: length })
  }

  removeListener(channel: DeltaChannel): boolean {
    return this.channels.delete(channel)
  }

  async stop(): Promise<void> {
    this.controller.abort()
    await this.done
  }

  private broadcast(count: number): void {
    const end = this.store.length
    for (const channel of this.channels) channel.push({ count, end })
  }

  private async consume(tailer: Partial<TailerConfig>): Promise<void> {
    const sink: RecordSink<T> = {
      append: (record) => this.store.append(record),
    }
    try {
      for await (const lines of readLinesContinuous(this.path, {
        signal: this.controller.signal,
        pollMs: tailer.pollMs,
        chunkBytes: tailer.chunkBytes,
        logger: this.logger,
      })) {
        const before = this.store.length
        try {
          for (const line of lines) this.parser(line, sink)
        } finally {
          // records appended before a parser failure still reach listeners
          const added = this.store.length - before
          if (added > 0) {
            this.logger.debug(
              { added, length: this.store.length },
              'records added',
            )
            this.broadcast(added)
          }
        }
      }
      this.currentStatus = 'stopped'
      this.logger.debug('watcher stopped')
    } catch (error) {
      this.currentStatus = 'failed'
      this.failure = error
      this.logger.error({ err: error }, 'watcher failed')
    }
  }
}
