/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts. The underlying promise keeps running and its outcome is still
 * observed, so a late rejection never goes unhandled.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )

    if (signal.aborted) onAbort()
  })
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs` with `onTimeout()`
 * as its reason, or when `parent` aborts.
 */
export async function runWithTimeout<T>(
  timeoutMs: number,
  onTimeout: () => Error,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(onTimeout()), timeoutMs)

  const onParentAbort = (): void => controller.abort(parent?.reason)
  if (parent) {
    if (parent.aborted) onParentAbort()
    else parent.addEventListener('abort', onParentAbort, { once: true })
  }

  try {
    return await abortable(fn(controller.signal), controller.signal)
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener('abort', onParentAbort)
  }
}
