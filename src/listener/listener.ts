import { clampWaitMs } from '../tailer/wait.js'

import { DeltaChannel } from './delta-channel.js'

import type { Watcher } from '../watcher/watcher.js'

export type RecordSource<T> = Pick<
  Watcher<T>,
  'registerListener' | 'removeListener' | 'slice'
>

export const DEFAULT_IDLE_TIMEOUT_MS = 10_000
export const DEFAULT_MAX_PENDING = 1024

export type ListenerOptions = {
  offset?: number
  timeoutMs?: number
  maxPending?: number
}

export type Chunk<T> =
  | { status: 'records'; records: T[]; start: number; end: number }
  | { status: 'timeout' }
  | { status: 'aborted' }

const normalizeOffset = (value: number | undefined): number => {
  if (value === undefined || !Number.isFinite(value)) return 0
  return Math.max(0, Math.floor(value))
}

/**
 * One consumer's subscription to a watcher. `offset` is the end index of
 * the last delivered chunk, and nothing before it is ever returned.
 *
 * A timeout only means nothing new arrived in the window: the producer may
 * have finished or may just be slow, and the file format carries no end
 * marker to tell them apart.
 */
export class Listener<T> {
  private readonly source: RecordSource<T>
  private readonly channel: DeltaChannel
  private readonly timeoutMs: number
  private delivered: number

  constructor(source: RecordSource<T>, options: ListenerOptions = {}) {
    this.source = source
    this.channel = new DeltaChannel(
      options.maxPending ?? DEFAULT_MAX_PENDING,
    )
    this.timeoutMs = options.timeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS
    this.delivered = normalizeOffset(options.offset)
    source.registerListener(this.channel, this.delivered)
  }

  get offset(): number {
    return this.delivered
  }

  get pending(): number {
    return this.channel.pending
  }

  async awaitNextChunk(
    timeoutMs = this.timeoutMs,
    signal?: AbortSignal,
  ): Promise<Chunk<T>> {
    const deadline = Date.now() + clampWaitMs(timeoutMs)
    for (;;) {
      const delta = await this.channel.take(
        Math.max(0, deadline - Date.now()),
        signal,
      )
      if (!delta)
        return signal?.aborted ? { status: 'aborted' } : { status: 'timeout' }
      // deltas that end at or before the offset were already seen
      const start = Math.max(delta.end - delta.count, this.delivered)
      if (start >= delta.end) continue
      this.delivered = delta.end
      return {
        status: 'records',
        records: this.source.slice(start, delta.end),
        start,
        end: delta.end,
      }
    }
  }

  close(): void {
    this.source.removeListener(this.channel)
  }
}
