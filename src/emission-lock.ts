/**
 * Emission Hold Lock
 * ==================
 *
 * Coalesces bursts of emissions. While the lock of an event is held, its
 * emissions are recorded instead of delivered, the last one replacing the
 * ones before it; releasing the outermost hold delivers that last emission
 * once. Holding a property's lock turns a series of assignments into a
 * single change event carrying the final value.
 *
 * Async callers use `run(fn)`, which also serializes the sections: a section
 * starts only after the previous one has finished.
 */

import type { Event } from './event'

const locks = new WeakMap<Event, EmissionHoldLock>()

const noop = () => {}

export class EmissionHoldLock {
  readonly event: Event
  private depth = 0
  private queue: Promise<void> = Promise.resolve()

  constructor(event: Event) {
    this.event = event
  }

  get isLocked(): boolean {
    return this.depth > 0
  }

  /** Holds the event. Calls nest; pair each with {@link release}. */
  acquire(): void {
    this.depth++
    this.event.hold()
  }

  release(): void {
    if (this.depth === 0) return
    this.depth--
    this.event.release()
  }

  /**
   * Runs `fn` with the event held, after every section started before it
   * has finished. Sections of the same lock must not nest.
   *
   * @example
   * ```ts
   * await sender.emissionLock('value').run(async () => {
   *   for (const value of await loadValues()) sender.set('value', value)
   * })
   * ```
   */
  run<T>(fn: () => T | PromiseLike<T>): Promise<T> {
    const result = this.queue
      .then(() => {
        this.acquire()
        return fn()
      })
      .finally(() => {
        this.release()
      })
    this.queue = result.then(noop, noop)
    return result
  }
}

/** The lock of `event`, created on first use. */
export function emissionLockFor(event: Event): EmissionHoldLock {
  let lock = locks.get(event)
  if (!lock) {
    lock = new EmissionHoldLock(event)
    locks.set(event, lock)
  }
  return lock
}
