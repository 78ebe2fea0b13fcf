/**
 * Dispatcher
 * ==========
 *
 * Base class for objects that emit events. A subclass declares what it emits
 * through two statics:
 *
 * - `static events`: names of plain events.
 * - `static properties`: `Property` objects, each with an event of its name.
 *
 * Declarations are merged along the class hierarchy into one frozen manifest
 * per class, composed on first construction (or eagerly through
 * `composeManifest`). A name may not be both an event and a property anywhere
 * in the hierarchy.
 *
 * Listeners are held without being kept alive: an inline closure that
 * nothing else references may be collected and silently stop receiving.
 *
 * @example
 * ```ts
 * class Counter extends Dispatcher<{ value: number }, { reset: [] }> {
 *   static events = ['reset']
 *   static properties = { value: new Property(0) }
 * }
 *
 * const counter = new Counter()
 * const onValue = (_: Counter, value: number) => console.log(value)
 * counter.bind({ value: onValue })
 * counter.set('value', 1) // logs 1
 * ```
 */

import { CompletionTracker } from './completion'
import { resolveExecutionContext, type ExecutionContext } from './context'
import { emissionLockFor, type EmissionHoldLock } from './emission-lock'
import {
  BindingContextError,
  DoesNotExistError,
  EventExistsError,
  PropertyExistsError
} from './errors'
import type { EmissionKeywords, Event } from './event'
import { Property, type PropertyChange } from './properties'
import { ensureRegistry, type EventRegistry } from './registry'
import {
  isAsyncFunction,
  isSubscriber,
  resolveSubscriber,
  type Subscriber
} from './subscriber'

// =============================================================================
// TYPES
// =============================================================================

/**
 * A listener whose parameters are checked bivariantly, the way DOM-style
 * handler typings are, so narrower parameter types are accepted.
 */
export type Listener<A extends readonly unknown[]> = {
  bivarianceHack(...args: A): unknown
}['bivarianceHack']

export type PropertyListener<I, V> = Listener<[instance: I, value: V, change: PropertyChange<V>]>

/** Event name to argument tuple. */
export type EventMap<T> = { [K in keyof T]: readonly unknown[] }

export type EventName<TProps, TEvents> = Extract<keyof TProps | keyof TEvents, string>

type ListenerFor<I, TProps, TEvents, K> = string extends K
  ? Listener<unknown[]>
  : K extends keyof TProps
    ? PropertyListener<I, TProps[K]>
    : K extends keyof TEvents
      ? TEvents[K] extends readonly unknown[]
        ? Listener<TEvents[K]>
        : never
      : never

/**
 * What `bind` takes: event name to a function or a `method()` subscriber.
 */
export type Listeners<I, TProps, TEvents> = {
  [K in EventName<TProps, TEvents>]?: Subscriber<ListenerFor<I, TProps, TEvents, K>>
}

export interface BindOptions {
  /** Execution context for the async listeners of this call. */
  context?: ExecutionContext
}

/**
 * Accessor pair for one property of one instance.
 */
export interface PropertyHandle<V> {
  readonly name: string
  get(): V
  set(value: V): void
}

export interface DispatcherManifest {
  readonly events: ReadonlySet<string>
  readonly properties: ReadonlyMap<string, Property>
}

/** Any class whose manifest can be composed. */
export type DispatcherClass = abstract new (...args: never[]) => object

interface Binding {
  readonly name: string
  readonly subscriber: Subscriber
  readonly context: ExecutionContext | undefined
}

// =============================================================================
// MANIFEST COMPOSITION
// =============================================================================

const manifests = new WeakMap<object, DispatcherManifest>()

function ownStatic(cls: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(cls, key) ? Reflect.get(cls, key) : undefined
}

function readEvents(cls: Function): readonly string[] {
  const events = ownStatic(cls, 'events')
  if (events === undefined) return []
  if (!Array.isArray(events) || !events.every((name): name is string => typeof name === 'string')) {
    throw new TypeError(`${cls.name}.events must be an array of event names`)
  }
  return events
}

function readProperties(cls: Function): Array<[string, Property]> {
  const properties = ownStatic(cls, 'properties')
  if (properties === undefined) return []
  if (typeof properties !== 'object' || properties === null) {
    throw new TypeError(`${cls.name}.properties must map names to Property objects`)
  }

  const entries: Array<[string, Property]> = []
  for (const name of Object.keys(properties)) {
    const property: unknown = Reflect.get(properties, name)
    if (!(property instanceof Property)) {
      throw new TypeError(`${cls.name}.properties.${name} is not a Property`)
    }
    entries.push([name, property])
  }
  return entries
}

/**
 * Builds (once) the manifest of `cls` from the `static events` and
 * `static properties` of every class in its chain, base classes first.
 * Throws {@link EventExistsError} or {@link PropertyExistsError} when a name
 * is declared as both.
 */
export function composeManifest(cls: DispatcherClass): DispatcherManifest {
  const cached = manifests.get(cls)
  if (cached) return cached

  const chain: Function[] = []
  let current: unknown = cls
  while (typeof current === 'function' && current !== Dispatcher) {
    chain.unshift(current)
    current = Object.getPrototypeOf(current)
  }

  const events = new Set<string>()
  const properties = new Map<string, Property>()

  for (const owner of chain) {
    for (const [name, property] of readProperties(owner)) {
      if (events.has(name)) throw new EventExistsError(name)
      property.attach(name)
      properties.set(name, property)
    }
    for (const name of readEvents(owner)) {
      if (properties.has(name)) throw new PropertyExistsError(name)
      events.add(name)
    }
  }

  const manifest: DispatcherManifest = Object.freeze({ events, properties })
  manifests.set(cls, manifest)
  return manifest
}

// =============================================================================
// DISPATCHER
// =============================================================================

export class Dispatcher<
  TProps = Record<string, unknown>,
  TEvents extends EventMap<TEvents> = Record<string, unknown[]>
> {
  /** Plain event names declared by this class. */
  declare static readonly events?: readonly string[]
  /**
   * Properties declared by this class. A class that is itself extended with
   * more properties should annotate this as `Record<string, Property>`.
   */
  declare static readonly properties?: Readonly<Record<string, Property>>

  private readonly manifest: DispatcherManifest

  constructor() {
    this.manifest = composeManifest(new.target)
  }

  // --- Registration ---

  /**
   * Adds events at runtime. Names already registered are skipped; a property
   * name raises {@link PropertyExistsError} and nothing is added.
   */
  registerEvent(...names: string[]): void {
    for (const name of names) {
      if (this.manifest.properties.has(name)) throw new PropertyExistsError(name)
    }
    this.registry().register(names)
  }

  /** Every event name of this instance, properties included. */
  get eventNames(): string[] {
    return this.registry().eventNames
  }

  // --- Properties ---

  get<K extends Extract<keyof TProps, string>>(name: K): TProps[K]
  get(name: string): unknown {
    return this.requireProperty(name).get(this)
  }

  set<K extends Extract<keyof TProps, string>>(name: K, value: TProps[K]): void
  set(name: string, value: unknown): void {
    this.requireProperty(name).set(this, value)
  }

  /**
   * Accessor pair for one property.
   *
   * @example
   * ```ts
   * const value = counter.property('value')
   * value.set(value.get() + 1)
   * ```
   */
  property<K extends Extract<keyof TProps, string>>(name: K): PropertyHandle<TProps[K]>
  property(name: string): PropertyHandle<unknown> {
    const property = this.requireProperty(name)
    return {
      name,
      get: () => property.get(this),
      set: (value: unknown) => property.set(this, value)
    }
  }

  // --- Binding ---

  /**
   * Subscribes listeners by event name. Every name is checked (and every
   * async listener given an execution context) before anything is bound.
   * Binding a listener twice to the same event has no effect.
   */
  bind(listeners: Listeners<this, TProps, TEvents>, options: BindOptions = {}): void {
    for (const binding of this.planBindings(listeners, options.context, false)) {
      this.registry().event(binding.name).add(binding.subscriber, binding.context)
    }
  }

  /**
   * Like {@link bind}, for async listeners only, all run on `context`.
   */
  bindAsync(context: ExecutionContext, listeners: Listeners<this, TProps, TEvents>): void {
    for (const binding of this.planBindings(listeners, context, true)) {
      this.registry().event(binding.name).add(binding.subscriber, binding.context)
    }
  }

  /**
   * Removes subscriptions from every event: a function or `method()`
   * subscriber removes itself, any other object removes the method
   * subscriptions it owns.
   */
  unbind(...targets: Array<Subscriber | object>): void {
    for (const event of this.registry().liveEvents()) {
      for (const target of targets) {
        event.remove(target)
      }
    }
  }

  // --- Emission ---

  /**
   * Delivers an emission to the listeners of `name`. Returns `false` when a
   * listener stopped propagation.
   */
  emit<K extends Extract<keyof TEvents, string>>(name: K, ...args: TEvents[K]): boolean
  emit<K extends Extract<keyof TProps, string>>(name: K, ...args: unknown[]): boolean
  emit(name: string, ...args: readonly unknown[]): boolean {
    return this.registry().event(name).emit(args)
  }

  /**
   * Like {@link emit}, with `keywords` passed to every listener after the
   * positional arguments. Awaiting the event resolves with them.
   *
   * @example
   * ```ts
   * editor.emitWithKeywords('saved', { silent: true }, 'notes.txt')
   * // listener('notes.txt', { silent: true })
   * ```
   */
  emitWithKeywords<K extends Extract<keyof TEvents, string>>(
    name: K,
    keywords: EmissionKeywords,
    ...args: TEvents[K]
  ): boolean
  emitWithKeywords(name: string, keywords: EmissionKeywords, ...args: readonly unknown[]): boolean {
    return this.registry().event(name).emit(args, keywords)
  }

  /**
   * The `Event` behind `name`. It can be awaited for the next emission.
   */
  getDispatcherEvent(name: EventName<TProps, TEvents>): Event {
    return this.registry().event(name)
  }

  // --- Coordination ---

  /** The hold lock of `name`. Always the same object for one event. */
  emissionLock(name: EventName<TProps, TEvents>): EmissionHoldLock {
    return emissionLockFor(this.registry().event(name))
  }

  /**
   * Opens a tracker retaining the async tasks scheduled by emissions of
   * `names` until it is closed.
   */
  trackCompletion(...names: Array<EventName<TProps, TEvents>>): CompletionTracker {
    const registry = this.registry()
    const events = names.map(name => registry.event(name))
    return new CompletionTracker(events)
  }

  /**
   * Runs `fn` with a tracker open on `names`, then waits for every task it
   * retained, even when `fn` fails.
   */
  async withCompletionTracking<T>(
    names: ReadonlyArray<EventName<TProps, TEvents>>,
    fn: (tracker: CompletionTracker) => T | Promise<T>
  ): Promise<T> {
    const tracker = this.trackCompletion(...names)
    try {
      return await fn(tracker)
    } finally {
      await tracker.close()
    }
  }

  // --- Internals ---

  private registry(): EventRegistry {
    return ensureRegistry(this, () => [...this.manifest.events, ...this.manifest.properties.keys()])
  }

  private requireProperty(name: string): Property {
    const property = this.manifest.properties.get(name)
    if (!property) throw new DoesNotExistError(name)
    return property
  }

  private planBindings(
    listeners: object,
    explicit: ExecutionContext | undefined,
    requireAsync: boolean
  ): Binding[] {
    const registry = this.registry()
    const bindings: Binding[] = []

    for (const name of Object.keys(listeners)) {
      const subscriber: unknown = Reflect.get(listeners, name)
      if (subscriber === undefined) continue
      if (!registry.has(name)) throw new DoesNotExistError(name)
      if (!isSubscriber(subscriber) || typeof resolveSubscriber(subscriber) !== 'function') {
        throw new TypeError(`Listener for "${name}" must be a function or a method() subscriber`)
      }

      const isAsync = isAsyncFunction(resolveSubscriber(subscriber))
      if (requireAsync && !isAsync) {
        throw new BindingContextError(`bindAsync() requires an async function for "${name}"`)
      }

      const context = isAsync ? resolveExecutionContext(explicit, name) : undefined
      bindings.push({ name, subscriber, context })
    }

    return bindings
  }
}
