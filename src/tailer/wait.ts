const MAX_WAIT_MS = 24 * 60 * 60 * 1_000

export const clampWaitMs = (timeoutMs: number): number => {
  if (!Number.isFinite(timeoutMs)) return MAX_WAIT_MS
  return Math.min(MAX_WAIT_MS, Math.max(0, timeoutMs))
}

export const waitForAbort = async (params: {
  signal: AbortSignal
  timeoutMs: number
}): Promise<void> => {
  const { signal } = params
  if (signal.aborted) return
  const waitMs = clampWaitMs(params.timeoutMs)
  if (waitMs <= 0) return
  await new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, waitMs)
    signal.addEventListener('abort', done, { once: true })
  })
}
