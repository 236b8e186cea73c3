/**
 * General utility helpers for svcward
 */

/**
 * Sleep for a given number of milliseconds.
 * Resolves early (without throwing) when `signal` aborts.
 * @param ms - Milliseconds to sleep
 * @param signal - Optional cancellation signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve()
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs` or when `parent`
 * aborts. Rejects with `onTimeout()` if the deadline passes first, even when
 * `fn` ignores its signal.
 *
 * @param fn - Operation to bound; receives the combined signal
 * @param timeoutMs - Deadline in milliseconds
 * @param onTimeout - Builds the error thrown on timeout
 * @param parent - Optional outer cancellation signal
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    let settled = false
    const finish = (action: () => void): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
      action()
    }

    const timer = setTimeout(() => {
      const error = onTimeout()
      controller.abort(error)
      finish(() => reject(error))
    }, timeoutMs)

    const onParentAbort = (): void => {
      const error = parent?.reason instanceof Error ? parent.reason : new Error('Operation cancelled')
      controller.abort(error)
      finish(() => reject(error))
    }

    if (parent?.aborted === true) {
      onParentAbort()
      return
    }
    parent?.addEventListener('abort', onParentAbort, { once: true })

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err instanceof Error ? err : new Error(String(err))))
    )
  })
}

/**
 * Format a duration in milliseconds to a human-readable string
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000)
    const seconds = Math.floor((ms % 60000) / 1000)
    return `${String(minutes)}m ${String(seconds)}s`
  }
  const hours = Math.floor(ms / 3600000)
  const minutes = Math.floor((ms % 3600000) / 60000)
  return `${String(hours)}h ${String(minutes)}m`
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Whether a process with this pid exists. EPERM means it exists but belongs
 * to another user.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM'
  }
}

// ---------------------------------------------------------------------------
// SerialLock
// ---------------------------------------------------------------------------

/**
 * FIFO mutex for async critical sections. Each `run()` starts only after
 * every previously queued `run()` has settled.
 *
 * @example
 * const lock = new SerialLock()
 * await lock.run(async () => { ... })
 */
export class SerialLock {
  private _tail: Promise<void> = Promise.resolve()
  private _pending = 0

  run<T>(fn: () => Promise<T>): Promise<T> {
    this._pending += 1
    const result = this._tail.then(fn)
    this._tail = result.then(
      () => {
        this._pending -= 1
      },
      () => {
        this._pending -= 1
      }
    )
    return result
  }

  /** True while an operation holds or waits for the lock */
  get busy(): boolean {
    return this._pending > 0
  }
}
