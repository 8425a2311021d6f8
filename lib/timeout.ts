import { TimeoutError } from "./errors"

/**
 * Runs an abortable operation with a time budget.
 *
 * The operation receives a signal that fires on timeout or when the parent
 * signal aborts, so HTTP calls (fetch, the AI SDK) stop instead of lingering.
 *
 * @throws TimeoutError - the budget elapsed first
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController()
  const onParentAbort = () => controller.abort(parent?.reason)
  if (parent?.aborted) {
    controller.abort(parent.reason)
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true })
  }

  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs)
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })

  try {
    return await Promise.race([fn(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener("abort", onParentAbort)
  }
}
