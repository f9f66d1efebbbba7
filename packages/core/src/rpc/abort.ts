/**
 * Settle with `promise`, or reject with `onAbort()` as soon as `signal` aborts.
 *
 * The listener is removed once the race is decided. The losing promise is
 * left to settle on its own; its outcome is ignored.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: () => Error,
): Promise<T> {
  if (!signal) return promise

  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort())
    if (signal.aborted) {
      abort()
      return
    }
    signal.addEventListener("abort", abort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener("abort", abort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener("abort", abort)
        reject(err)
      },
    )
  })
}
