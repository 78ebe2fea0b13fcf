// =============================================================================
// IMPLEMENTATION: COMPLETION TRACKING
// =============================================================================

import { DoesNotExistError } from './errors'
import type { Event, TaskSink } from './event'

/**
 * Collects the tasks that emissions of some events schedule for async
 * listeners, so the caller can wait for them.
 *
 * A tracker is open from construction until {@link CompletionTracker.close}.
 * Tasks scheduled while it is open are retained until they settle; tasks
 * scheduled before or after are not seen. There is no timeout.
 *
 * @example
 * ```ts
 * const tracker = sender.trackCompletion('value')
 * sender.set('value', 42)
 * await tracker.close() // every async `value` listener has finished
 * ```
 */
export class CompletionTracker implements TaskSink {
  private readonly events: readonly Event[]
  private readonly tasks = new Map<string, Set<Promise<unknown>>>()
  private open = true

  constructor(events: Iterable<Event>) {
    this.events = [...events]
    for (const event of this.events) {
      event.attachSink(this)
    }
  }

  get isOpen(): boolean {
    return this.open
  }

  /** Retained tasks that have not settled yet. */
  get pending(): number {
    let count = 0
    for (const tasks of this.tasks.values()) {
      count += tasks.size
    }
    return count
  }

  retain(eventName: string, task: Promise<unknown>): void {
    let tasks = this.tasks.get(eventName)
    if (!tasks) {
      tasks = new Set()
      this.tasks.set(eventName, tasks)
    }
    tasks.add(task)

    const settle = () => {
      tasks.delete(task)
    }
    void task.then(settle, settle)
  }

  /**
   * Resolves once the retained tasks of `eventName` (of every tracked event
   * when omitted) have settled, including tasks retained while waiting.
   * Task failures do not reject the wait.
   */
  async wait(eventName?: string): Promise<void> {
    if (eventName !== undefined && !this.events.some(event => event.name === eventName)) {
      throw new DoesNotExistError(eventName)
    }

    for (;;) {
      const pending = this.snapshot(eventName)
      if (pending.length === 0) return
      await Promise.allSettled(pending)
    }
  }

  /**
   * Stops retaining new tasks and waits for the ones already retained.
   */
  async close(): Promise<void> {
    if (this.open) {
      this.open = false
      for (const event of this.events) {
        event.detachSink(this)
      }
    }
    await this.wait()
  }

  private snapshot(eventName: string | undefined): Promise<unknown>[] {
    if (eventName !== undefined) {
      return [...(this.tasks.get(eventName) ?? [])]
    }
    const all: Promise<unknown>[] = []
    for (const tasks of this.tasks.values()) {
      all.push(...tasks)
    }
    return all
  }
}
