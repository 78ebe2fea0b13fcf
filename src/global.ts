/**
 * Global Dispatcher
 * =================
 *
 * A module-level dispatcher for events that belong to no particular object.
 * Its events are registered at runtime with `registerEvent` (or implicitly
 * by `receiver`) and take any arguments.
 *
 * @example
 * ```ts
 * registerEvent('settings-changed')
 *
 * const onSettings = receiver('settings-changed', (key: string) => reload(key))
 * emit('settings-changed', 'theme')
 * ```
 */

import type { CompletionTracker } from './completion'
import { resolveExecutionContext, type ExecutionContext } from './context'
import { Dispatcher, type BindOptions } from './dispatcher'
import type { EmissionHoldLock } from './emission-lock'
import { DoesNotExistError } from './errors'
import type { EmissionKeywords, Event } from './event'
import { isAsyncFunction, type AnyListener, type Subscriber } from './subscriber'

class GlobalDispatcher extends Dispatcher<{}, Record<string, unknown[]>> {}

export interface ReceiverOptions {
  /**
   * Bind now to the names that exist and keep the listener until the others
   * are registered. The listener is held weakly while it waits.
   */
  cache?: boolean
  /** Register missing names instead of failing. */
  autoRegister?: boolean
  /** Execution context for an async listener. */
  context?: ExecutionContext
}

interface CachedReceiver {
  readonly listener: WeakRef<AnyListener>
  readonly context: ExecutionContext | undefined
}

let dispatcher = new GlobalDispatcher()
const cached = new Map<string, CachedReceiver[]>()

// =============================================================================
// DELEGATES
// =============================================================================

/**
 * Registers global events. Listeners cached by `receiver` for these names
 * are bound now.
 */
export function registerEvent(...names: string[]): void {
  dispatcher.registerEvent(...names)

  for (const name of names) {
    const waiting = cached.get(name)
    if (!waiting) continue
    cached.delete(name)

    for (const entry of waiting) {
      const listener = entry.listener.deref()
      if (listener) dispatcher.bind({ [name]: listener }, { context: entry.context })
    }
  }
}

export function bind(listeners: Record<string, Subscriber>, options?: BindOptions): void {
  dispatcher.bind(listeners, options)
}

export function bindAsync(context: ExecutionContext, listeners: Record<string, Subscriber>): void {
  dispatcher.bindAsync(context, listeners)
}

export function unbind(...targets: Array<Subscriber | object>): void {
  dispatcher.unbind(...targets)
  for (const [name, waiting] of cached) {
    const remaining = waiting.filter(entry => {
      const listener = entry.listener.deref()
      return listener !== undefined && !targets.includes(listener)
    })
    if (remaining.length > 0) {
      cached.set(name, remaining)
    } else {
      cached.delete(name)
    }
  }
}

export function emit(name: string, ...args: unknown[]): boolean {
  return dispatcher.emit(name, ...args)
}

export function emitWithKeywords(name: string, keywords: EmissionKeywords, ...args: unknown[]): boolean {
  return dispatcher.emitWithKeywords(name, keywords, ...args)
}

export function getDispatcherEvent(name: string): Event {
  return dispatcher.getDispatcherEvent(name)
}

export function emissionLock(name: string): EmissionHoldLock {
  return dispatcher.emissionLock(name)
}

export function trackCompletion(...names: string[]): CompletionTracker {
  return dispatcher.trackCompletion(...names)
}

/** Whether `name` is a registered global event. */
export function hasEvent(name: string): boolean {
  return dispatcher.eventNames.includes(name)
}

// =============================================================================
// RECEIVER
// =============================================================================

/**
 * Binds `listener` to one or more global events and returns it, so it can be
 * kept in a variable (the global dispatcher does not keep it alive).
 *
 * Unregistered names raise {@link DoesNotExistError} and nothing is bound,
 * unless `autoRegister` registers them or `cache` defers them.
 */
export function receiver<F extends AnyListener>(
  names: string | readonly string[],
  listener: F,
  options: ReceiverOptions = {}
): F {
  const list = typeof names === 'string' ? [names] : [...names]
  const missing = list.filter(name => !hasEvent(name))

  if (missing.length > 0 && !options.autoRegister && !options.cache) {
    throw new DoesNotExistError(missing[0])
  }

  // Resolve the context up front so a failure binds nothing
  const context = isAsyncFunction(listener)
    ? resolveExecutionContext(options.context, list[0])
    : undefined

  if (options.autoRegister) {
    registerEvent(...missing)
  } else {
    for (const name of missing) {
      const waiting = cached.get(name) ?? []
      waiting.push({ listener: new WeakRef(listener), context })
      cached.set(name, waiting)
    }
  }

  const present = options.autoRegister ? list : list.filter(name => !missing.includes(name))
  const listeners: Record<string, Subscriber> = {}
  for (const name of present) {
    listeners[name] = listener
  }
  dispatcher.bind(listeners, { context })

  return listener
}

/**
 * Discards every global event, listener and cached receiver.
 */
export function resetGlobalDispatcher(): void {
  dispatcher = new GlobalDispatcher()
  cached.clear()
}
