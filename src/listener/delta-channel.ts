import { clampWaitMs } from '../tailer/wait.js'

export type Delta = {
  count: number
  end: number
}

type Waiter = (delta: Delta) => void

const mergeDeltas = (older: Delta, newer: Delta): Delta => {
  const start = Math.min(older.end - older.count, newer.end - newer.count)
  const end = Math.max(older.end, newer.end)
  return { count: end - start, end }
}

export class DeltaChannel {
  readonly maxPending: number
  private queue: Delta[] = []
  private waiters: Waiter[] = []

  constructor(maxPending = Number.POSITIVE_INFINITY) {
    if (!(maxPending >= 1))
      throw new RangeError(`[channel] maxPending must be >= 1: ${maxPending}`)
    this.maxPending = maxPending
  }

  get pending(): number {
    return this.queue.length
  }

  push(delta: Delta): void {
    if (delta.count <= 0) return
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter(delta)
      return
    }
    const last = this.queue.at(-1)
    if (last && this.queue.length >= this.maxPending) {
      this.queue[this.queue.length - 1] = mergeDeltas(last, delta)
      return
    }
    this.queue.push(delta)
  }

  take(timeoutMs: number, signal?: AbortSignal): Promise<Delta | undefined> {
    const next = this.queue.shift()
    if (next) return Promise.resolve(next)
    const waitMs = clampWaitMs(timeoutMs)
    if (waitMs <= 0 || signal?.aborted) return Promise.resolve(undefined)
    return new Promise((resolve) => {
      const finish = (delta: Delta | undefined) => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', giveUp)
        resolve(delta)
      }
      const waiter: Waiter = (delta) => finish(delta)
      const giveUp = () => {
        this.waiters = this.waiters.filter((item) => item !== waiter)
        finish(undefined)
      }
      const timer = setTimeout(giveUp, waitMs)
      signal?.addEventListener('abort', giveUp, { once: true })
      this.waiters.push(waiter)
    })
  }
}
