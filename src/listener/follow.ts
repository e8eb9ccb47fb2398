import type { Listener } from './listener.js'

// Deltas already queued when `signal` aborts are still yielded.
export async function* followRecords<T>(
  listener: Listener<T>,
  options: { idleTimeoutMs?: number; signal?: AbortSignal } = {},
): AsyncGenerator<T[], void, undefined> {
  try {
    for (;;) {
      const chunk = await listener.awaitNextChunk(
        options.idleTimeoutMs,
        options.signal,
      )
      if (chunk.status !== 'records') return
      yield chunk.records
    }
  } finally {
    listener.close()
  }
}
