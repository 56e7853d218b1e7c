export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

// Resolves early, without error, when the signal aborts.
export const delay: Sleep = (ms, signal) => new Promise<void>(resolve => {
  if (signal?.aborted) {
    resolve()
    return
  }
  const onAbort = () => {
    clearTimeout(timer)
    resolve()
  }
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort)
    resolve()
  }, ms)
  signal?.addEventListener('abort', onAbort, { once: true })
})
