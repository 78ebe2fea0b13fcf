// =============================================================================
// IMPLEMENTATION: EVENT
// =============================================================================

import type { ExecutionContext } from './context'
import { BindingContextError } from './errors'
import {
  STOP,
  createSubscriberRef,
  isSubscriber,
  type LiveListener,
  type Subscriber,
  type SubscriberRef
} from './subscriber'

/**
 * Keyword record delivered after the positional arguments of an emission.
 * Property events carry a `PropertyChange` here.
 */
export type EmissionKeywords = Readonly<Record<string, unknown>>

/**
 * What awaiting an {@link Event} resolves with: the positional arguments and
 * the keyword record of the next emission (`{}` when there was none).
 */
export type Emission = readonly [args: readonly unknown[], keywords: EmissionKeywords]

/**
 * Receives the tasks scheduled for async listeners. Implemented by
 * completion trackers.
 */
export interface TaskSink {
  retain(eventName: string, task: Promise<unknown>): void
}

interface SubscriberEntry {
  readonly ref: SubscriberRef
  readonly context: ExecutionContext | undefined
  active: boolean
}

function callSync(listener: LiveListener, args: readonly unknown[]): unknown {
  try {
    return listener(args)
  } catch (error) {
    if (error !== STOP) throw error
    return STOP
  }
}

/**
 * A named channel owned by one emitter instance.
 *
 * Listeners are kept in bind order behind non-owning references. Sync
 * listeners are called inline by {@link Event.emit}; async listeners are
 * scheduled on the execution context they were bound with.
 *
 * The event is also awaitable: each `await event` waits for the next
 * emission and resolves with `[args, keywords]`.
 *
 * @example
 * ```ts
 * const event = sender.getDispatcherEvent('message')
 * const [args] = await event
 * ```
 */
export class Event implements PromiseLike<Emission> {
  readonly name: string
  private entries: SubscriberEntry[] = []
  private waiters: Array<(emission: Emission) => void> = []
  private readonly sinks = new Set<TaskSink>()
  private holdDepth = 0
  private held: { args: readonly unknown[]; keywords: EmissionKeywords | undefined } | undefined

  constructor(name: string) {
    this.name = name
  }

  // Subscriber management

  /** Live synchronous listeners. Prunes dead references. */
  get listenerCount(): number {
    return this.liveEntries().filter(entry => !entry.context).length
  }

  /** Live async listeners. Prunes dead references. */
  get asyncListenerCount(): number {
    return this.liveEntries().filter(entry => entry.context).length
  }

  /** Execution contexts that live async listeners are bound to. */
  get contexts(): ReadonlySet<ExecutionContext> {
    const contexts = new Set<ExecutionContext>()
    for (const entry of this.liveEntries()) {
      if (entry.context) contexts.add(entry.context)
    }
    return contexts
  }

  has(subscriber: Subscriber): boolean {
    return this.entries.some(entry => entry.active && entry.ref.matches(subscriber))
  }

  /**
   * Adds a listener. Returns `false` when it was already bound.
   * Async listeners need `context`; sync listeners ignore it.
   */
  add(subscriber: Subscriber, context?: ExecutionContext): boolean {
    if (this.has(subscriber)) return false

    const ref = createSubscriberRef(subscriber)
    if (ref.isAsync && !context) {
      throw new BindingContextError(`Async function given without execution context for "${this.name}"`)
    }

    this.entries.push({ ref, context: ref.isAsync ? context : undefined, active: true })
    return true
  }

  /**
   * Removes the entries of a function or `method()` subscriber, or, for any
   * other object, every method subscription owned by it. Returns the number
   * of entries removed.
   */
  remove(target: Subscriber | object): number {
    let removed = 0

    this.entries = this.entries.filter(entry => {
      const matched = isSubscriber(target) ? entry.ref.matches(target) : entry.ref.isOwnedBy(target)
      if (matched) {
        entry.active = false
        removed++
      }
      return !matched
    })

    return removed
  }

  // Emission

  /**
   * Delivers an emission. Listeners receive `...args`, followed by `keywords`
   * when given. Returns `false` when a sync listener stopped propagation.
   */
  emit(args: readonly unknown[], keywords?: EmissionKeywords): boolean {
    if (this.holdDepth > 0) {
      this.held = { args, keywords }
      return true
    }
    return this.deliver(args, keywords)
  }

  private deliver(args: readonly unknown[], keywords: EmissionKeywords | undefined): boolean {
    this.resolveWaiters([args, keywords ?? {}])

    const callArgs = keywords === undefined ? args : [...args, keywords]
    let pruned = false

    try {
      // Listeners bound during this emission are not part of it
      for (const entry of [...this.entries]) {
        if (!entry.active) continue

        const listener = entry.ref.deref()
        if (!listener) {
          entry.active = false
          pruned = true
          continue
        }

        if (entry.context) {
          this.schedule(entry.context, listener, callArgs)
        } else if (callSync(listener, callArgs) === STOP) {
          return false
        }
      }
      return true
    } finally {
      if (pruned) {
        this.entries = this.entries.filter(entry => entry.active)
      }
    }
  }

  private schedule(context: ExecutionContext, listener: LiveListener, args: readonly unknown[]): void {
    const task = context.schedule(() => listener(args))
    for (const sink of this.sinks) {
      sink.retain(this.name, task)
    }
  }

  // Emission hold

  get isHeld(): boolean {
    return this.holdDepth > 0
  }

  /**
   * Defers emissions until the matching {@link Event.release}. Holds nest.
   */
  hold(): void {
    this.holdDepth++
  }

  /**
   * Ends one hold. When the last hold ends, the most recent deferred
   * emission (if any) is delivered.
   */
  release(): void {
    if (this.holdDepth === 0) return
    this.holdDepth--
    if (this.holdDepth > 0 || !this.held) return

    const { args, keywords } = this.held
    this.held = undefined
    this.deliver(args, keywords)
  }

  // Completion tracking

  attachSink(sink: TaskSink): void {
    this.sinks.add(sink)
  }

  detachSink(sink: TaskSink): void {
    this.sinks.delete(sink)
  }

  // Awaiting

  /**
   * Resolves with the next emission. Every call registers its own waiter.
   */
  wait(): Promise<Emission> {
    return new Promise<Emission>(resolve => {
      this.waiters.push(resolve)
    })
  }

  then<TResult1 = Emission, TResult2 = never>(
    onfulfilled?: ((value: Emission) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.wait().then(onfulfilled, onrejected)
  }

  private resolveWaiters(emission: Emission): void {
    if (this.waiters.length === 0) return
    const waiters = this.waiters
    this.waiters = []
    for (const resolve of waiters) {
      resolve(emission)
    }
  }

  private liveEntries(): SubscriberEntry[] {
    this.entries = this.entries.filter(entry => {
      if (entry.ref.deref()) return true
      entry.active = false
      return false
    })
    return this.entries
  }

  toString(): string {
    return this.name
  }
}
