/**
 * Progress Publisher
 *
 * In-process hub pushing processing progress to subscribers of a sermon.
 * Published fractions are clamped to [0, 1] and a fraction lower than the
 * last one published for that sermon is dropped. Each subscriber keeps at
 * most `bufferSize` undelivered updates, oldest evicted first.
 */

import { loggerService } from './loggerService'
import { isTerminalJob } from './sermonStatus'
import type { ProcessingJob, ProgressUpdate } from '../types/sermon'

const log = loggerService.scope('ProgressPublisher')

export const DEFAULT_SUBSCRIBER_BUFFER = 32

interface Subscriber {
  queue: ProgressUpdate[]
  wake: (() => void) | null
  done: boolean
}

export class ProgressPublisher {
  private readonly subscribers = new Map<string, Set<Subscriber>>()
  private readonly latest = new Map<string, ProgressUpdate>()

  constructor(private readonly bufferSize: number = DEFAULT_SUBSCRIBER_BUFFER) {}

  /**
   * Returns false when the update was dropped as a regression
   */
  publish(sermonId: string, job: ProcessingJob, progress: number): boolean {
    const clamped = Number.isFinite(progress) ? Math.min(Math.max(progress, 0), 1) : 0
    const previous = this.latest.get(sermonId)

    if (previous && clamped < previous.progress) {
      log.debug('Dropped regressing progress', { sermonId, progress: clamped, last: previous.progress })
      return false
    }

    const update: ProgressUpdate = { job, progress: clamped }
    this.latest.set(sermonId, update)

    for (const subscriber of this.subscribers.get(sermonId) ?? []) {
      subscriber.queue.push(update)
      if (subscriber.queue.length > this.bufferSize) {
        subscriber.queue.shift()
      }
      this.notify(subscriber)
    }

    if (isTerminalJob(job)) {
      this.complete(sermonId)
    }
    return true
  }

  /**
   * End every stream of a sermon after it drains its buffered updates
   */
  complete(sermonId: string): void {
    for (const subscriber of this.subscribers.get(sermonId) ?? []) {
      subscriber.done = true
      this.notify(subscriber)
    }
    this.subscribers.delete(sermonId)
  }

  lastUpdate(sermonId: string): ProgressUpdate | null {
    return this.latest.get(sermonId) ?? null
  }

  /**
   * Forget the last published fraction so a new job can start from zero
   */
  resetSermon(sermonId: string): void {
    this.latest.delete(sermonId)
  }

  subscriberCount(sermonId: string): number {
    return this.subscribers.get(sermonId)?.size ?? 0
  }

  /**
   * Updates published after subscribing, in order. A sermon whose last
   * update is already terminal yields that update and ends.
   */
  async *subscribe(sermonId: string, signal?: AbortSignal): AsyncGenerator<ProgressUpdate, void, undefined> {
    const last = this.latest.get(sermonId)
    if (last && isTerminalJob(last.job)) {
      yield last
      return
    }
    if (signal?.aborted) return

    const subscriber: Subscriber = { queue: [], wake: null, done: false }
    const onAbort = (): void => {
      subscriber.done = true
      this.notify(subscriber)
    }

    let set = this.subscribers.get(sermonId)
    if (!set) {
      set = new Set()
      this.subscribers.set(sermonId, set)
    }
    set.add(subscriber)
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      while (!signal?.aborted) {
        const next = subscriber.queue.shift()
        if (next) {
          yield next
          continue
        }
        if (subscriber.done) return

        await new Promise<void>(resolve => {
          subscriber.wake = resolve
        })
      }
    } finally {
      signal?.removeEventListener('abort', onAbort)
      this.removeSubscriber(sermonId, subscriber)
    }
  }

  private notify(subscriber: Subscriber): void {
    const wake = subscriber.wake
    subscriber.wake = null
    wake?.()
  }

  private removeSubscriber(sermonId: string, subscriber: Subscriber): void {
    const set = this.subscribers.get(sermonId)
    if (!set) return
    set.delete(subscriber)
    if (set.size === 0) {
      this.subscribers.delete(sermonId)
    }
  }
}
