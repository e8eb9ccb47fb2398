import { resolve } from 'node:path'

import { defaultConfig } from '../config.js'
import { Listener } from '../listener/listener.js'
import { getLogger } from '../log/logger.js'

import { Watcher } from './watcher.js'

import type { AppConfig } from '../config.js'
import type { ListenerOptions } from '../listener/listener.js'
import type { WatcherKind } from '../parsers/types.js'
import type { Logger } from 'pino'

export type WatcherKinds<R> = { [K in keyof R]: WatcherKind<R[K]> }

type WatcherTables<R> = { [K in keyof R]?: Map<string, Watcher<R[K]>> }

type StartedWatcher = Pick<Watcher<unknown>, 'kind' | 'path' | 'stop'>

/**
 * One watcher per (kind, resolved path). Owned by whoever starts the
 * application; watchers are created on first lookup and kept until `close()`.
 */
export class WatcherRegistry<R extends Record<string, unknown>> {
  private readonly kinds: WatcherKinds<R>
  private readonly config: AppConfig
  private readonly logger: Logger
  private readonly tables: WatcherTables<R> = {}
  private readonly started: StartedWatcher[] = []

  constructor(
    kinds: WatcherKinds<R>,
    options: { config?: AppConfig; logger?: Logger } = {},
  ) {
    this.kinds = kinds
    this.config = options.config ?? defaultConfig()
    this.logger = options.logger ?? getLogger('registry')
  }

  get size(): number {
    return this.started.length
  }

  getOrCreate<K extends keyof R & string>(
    kind: K,
    path: string,
  ): Watcher<R[K]> {
    const key = resolve(path)
    let table = this.tables[kind]
    if (!table) {
      table = new Map()
      this.tables[kind] = table
    }
    const existing = table.get(key)
    if (existing) return existing

    const logger = this.logger.child({ kind, path: key })
    const watcher = new Watcher<R[K]>({
      kind,
      path: key,
      parser: this.kinds[kind].createParser(logger),
      tailer: this.config.tailer,
      store: this.config.store,
      logger,
    })
    table.set(key, watcher)
    this.started.push(watcher)
    logger.info('watcher started')
    return watcher
  }

  listen<K extends keyof R & string>(
    kind: K,
    path: string,
    options: ListenerOptions = {},
  ): Listener<R[K]> {
    const { listener } = this.config
    return new Listener(this.getOrCreate(kind, path), {
      offset: options.offset,
      timeoutMs: options.timeoutMs ?? listener.idleTimeoutMs,
      maxPending: options.maxPending ?? listener.maxPending,
    })
  }

  async close(): Promise<void> {
    await Promise.all(this.started.map((watcher) => watcher.stop()))
    this.logger.info({ watchers: this.started.length }, 'registry closed')
  }
}
