/**
 * FailureWindow: sliding window of failure timestamps for one service.
 *
 * An entry counts while `now - t < windowMs`. Old entries are pruned when the
 * window is read or written; a healthy observation never touches it.
 */

export class FailureWindow {
  private readonly _windowMs: number
  private _timestamps: number[] = []

  constructor(windowMs: number) {
    this._windowMs = windowMs
  }

  get windowMs(): number {
    return this._windowMs
  }

  /** Record a failure at `now` and return the pruned count, including it */
  record(now: number): number {
    this.prune(now)
    this._timestamps.push(now)
    return this._timestamps.length
  }

  /** Drop entries that have aged out of the window */
  prune(now: number): void {
    this._timestamps = this._timestamps.filter((t) => now - t < this._windowMs)
  }

  /** Failures inside the window as of `now` */
  count(now: number): number {
    this.prune(now)
    return this._timestamps.length
  }

  clear(): void {
    this._timestamps = []
  }

  /** Timestamps currently held (oldest first) */
  entries(): readonly number[] {
    return [...this._timestamps]
  }
}
