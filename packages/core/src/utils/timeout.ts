/**
 * Race `work` against a timer. A non-positive or infinite `ms` disables the limit.
 * The timer is always cleared, so no handle is left behind.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return work

  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms)
  })

  try {
    return await Promise.race([work, timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * `withTimeout` for work that can be stopped. `start` receives a signal
 * that is aborted when the limit passes; the timeout error is raised only
 * after the work itself has settled, so nothing is left running behind it.
 */
export async function withAbortableTimeout<T>(
  start: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController()
  const work = start(controller.signal)
  const expired: { error?: Error } = {}

  try {
    return await withTimeout(work, ms, () => (expired.error = onTimeout()))
  } catch (error) {
    if (expired.error !== undefined && error === expired.error) {
      controller.abort(error)
      await Promise.allSettled([work])
    }
    throw error
  }
}
