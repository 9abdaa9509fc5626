/**
 * Audio Level History
 *
 * Fixed-size ring buffer of recent meter levels (0-1). Consumers either read
 * snapshots or iterate it asynchronously; each iteration yields the current
 * snapshot after new levels arrive and ends on close() or when its
 * AbortSignal fires.
 */

export const DEFAULT_LEVEL_HISTORY_SIZE = 100

type Waiter = () => void

export class AudioLevelHistory implements AsyncIterable<number[]> {
  private readonly buffer: number[]
  private start: number = 0
  private count: number = 0
  private version: number = 0
  private closed: boolean = false
  private readonly waiters = new Set<Waiter>()

  constructor(readonly capacity: number = DEFAULT_LEVEL_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Level history capacity must be a positive integer (got ${capacity})`)
    }
    this.buffer = new Array<number>(capacity).fill(0)
  }

  /**
   * Append a level, evicting the oldest once full
   */
  push(level: number): void {
    if (this.closed) return

    const clamped = Number.isFinite(level) ? Math.min(Math.max(level, 0), 1) : 0
    if (this.count < this.capacity) {
      this.buffer[(this.start + this.count) % this.capacity] = clamped
      this.count++
    } else {
      this.buffer[this.start] = clamped
      this.start = (this.start + 1) % this.capacity
    }

    this.version++
    this.wake()
  }

  /**
   * Levels oldest-first
   */
  snapshot(): number[] {
    const levels: number[] = []
    for (let i = 0; i < this.count; i++) {
      levels.push(this.buffer[(this.start + i) % this.capacity])
    }
    return levels
  }

  get latest(): number {
    return this.count === 0 ? 0 : this.buffer[(this.start + this.count - 1) % this.capacity]
  }

  get size(): number {
    return this.count
  }

  /** Iterators currently waiting for the next level */
  get waitingConsumers(): number {
    return this.waiters.size
  }

  get isClosed(): boolean {
    return this.closed
  }

  clear(): void {
    this.start = 0
    this.count = 0
    this.version++
    this.wake()
  }

  /**
   * End every iteration. Pushes after close are ignored.
   */
  close(): void {
    this.closed = true
    this.wake()
  }

  async *stream(signal?: AbortSignal): AsyncGenerator<number[], void, undefined> {
    let seen = this.version

    while (!this.closed && !signal?.aborted) {
      if (this.version === seen) {
        const changed = await this.nextChange(signal)
        if (!changed) return
      }
      seen = this.version
      yield this.snapshot()
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<number[], void, undefined> {
    return this.stream()
  }

  private wake(): void {
    const waiting = [...this.waiters]
    this.waiters.clear()
    for (const waiter of waiting) {
      waiter()
    }
  }

  /**
   * Resolves true on the next change, false on close or abort
   */
  private nextChange(signal?: AbortSignal): Promise<boolean> {
    return new Promise(resolve => {
      const onAbort = (): void => {
        this.waiters.delete(waiter)
        resolve(false)
      }
      const waiter: Waiter = () => {
        signal?.removeEventListener('abort', onAbort)
        resolve(!this.closed)
      }

      this.waiters.add(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}
