/**
 * Non-owning listener references
 * ==============================
 *
 * An event never keeps its listeners alive. Plain functions are held through
 * a `WeakRef` to the function itself; methods are held as a `WeakRef` to the
 * owner plus the method key, and resolved on the owner at emission time. A
 * reference whose target has been collected is "dead" and gets pruned by the
 * next traversal of its event.
 */

// =============================================================================
// CORE TYPES AND BRANDS
// =============================================================================

const __stopBrand = Symbol('__stopBrand')
const __methodBrand = Symbol('__methodBrand')

type StopSignal = { readonly [__stopBrand]: true }

/**
 * Returned (or thrown through {@link halt}) by a synchronous listener to stop
 * the remaining listeners of the current emission from being called.
 */
export const STOP: StopSignal = { [__stopBrand]: true } as const

/**
 * Stops propagation from anywhere inside a synchronous listener.
 * Returns never for proper type inference.
 */
export function halt(): never {
  throw STOP
}

/**
 * Storage type for listeners. Every function type is assignable to it; calls
 * go through `Reflect.apply`.
 */
export type AnyListener = (...args: never[]) => unknown

/**
 * A listener given as an owner plus the key of one of its methods. Created
 * with {@link method}. Only the owner is tracked, so the subscription lives
 * exactly as long as the owner does.
 */
export interface MethodSubscriber<F extends AnyListener = AnyListener> {
  readonly [__methodBrand]: true
  readonly owner: object
  readonly key: PropertyKey
  /** Phantom slot carrying the method's type */
  readonly __listener?: F
}

/**
 * Anything `bind` accepts for one event.
 */
export type Subscriber<F extends AnyListener = AnyListener> = F | MethodSubscriber<F>

type MethodKeys<O> = {
  [K in keyof O]: O[K] extends AnyListener ? K : never
}[keyof O]

/**
 * References `owner[key]` without holding `owner`.
 *
 * @example
 * ```ts
 * sender.bind({ value: method(view, 'onValue') })
 * sender.unbind(view) // removes every method subscription owned by `view`
 * ```
 */
export function method<O extends object, K extends MethodKeys<O>>(
  owner: O,
  key: K
): MethodSubscriber<Extract<O[K], AnyListener>> {
  return { [__methodBrand]: true, owner, key }
}

export function isMethodSubscriber(value: unknown): value is MethodSubscriber {
  return typeof value === 'object' && value !== null && __methodBrand in value
}

/**
 * True for values `bind` accepts as a listener, as opposed to an owner
 * object passed to `unbind`.
 */
export function isSubscriber(value: unknown): value is Subscriber {
  return typeof value === 'function' || isMethodSubscriber(value)
}

/**
 * True for native `async function` / async arrow / async method values.
 */
export function isAsyncFunction(value: unknown): boolean {
  return typeof value === 'function' && Object.prototype.toString.call(value) === '[object AsyncFunction]'
}

// =============================================================================
// WEAK REFERENCES
// =============================================================================

/**
 * A resolved listener, called with the emitted arguments.
 */
export type LiveListener = (args: readonly unknown[]) => unknown

/**
 * Lookup-only handle on a listener. `deref` returns `undefined` once the
 * listener (or its owner) has been collected.
 */
export interface SubscriberRef {
  readonly isAsync: boolean
  deref(): LiveListener | undefined
  /** Same listener as `target` (function identity, or owner and key) */
  matches(target: Subscriber): boolean
  /** Owned by `owner` (method references only) */
  isOwnedBy(owner: object): boolean
}

class FunctionRef implements SubscriberRef {
  readonly isAsync: boolean
  private readonly ref: WeakRef<AnyListener>

  constructor(fn: AnyListener) {
    this.ref = new WeakRef(fn)
    this.isAsync = isAsyncFunction(fn)
  }

  deref(): LiveListener | undefined {
    const fn = this.ref.deref()
    return fn ? (args) => Reflect.apply(fn, undefined, args) : undefined
  }

  matches(target: Subscriber): boolean {
    return typeof target === 'function' && this.ref.deref() === target
  }

  isOwnedBy(): boolean {
    return false
  }
}

class MethodRef implements SubscriberRef {
  readonly isAsync: boolean
  private readonly owner: WeakRef<object>
  private readonly key: PropertyKey

  constructor(subscriber: MethodSubscriber) {
    this.owner = new WeakRef(subscriber.owner)
    this.key = subscriber.key
    this.isAsync = isAsyncFunction(Reflect.get(subscriber.owner, subscriber.key))
  }

  deref(): LiveListener | undefined {
    const owner = this.owner.deref()
    if (!owner) return undefined
    const fn: unknown = Reflect.get(owner, this.key)
    // A method that was deleted from the owner counts as dead
    if (typeof fn !== 'function') return undefined
    return (args) => Reflect.apply(fn, owner, args)
  }

  matches(target: Subscriber): boolean {
    return isMethodSubscriber(target) && target.key === this.key && this.owner.deref() === target.owner
  }

  isOwnedBy(owner: object): boolean {
    return this.owner.deref() === owner
  }
}

/**
 * Wraps a listener in a non-owning reference.
 */
export function createSubscriberRef(subscriber: Subscriber): SubscriberRef {
  return isMethodSubscriber(subscriber) ? new MethodRef(subscriber) : new FunctionRef(subscriber)
}

/**
 * The function a subscriber currently resolves to, used for up-front checks
 * at bind time.
 */
export function resolveSubscriber(subscriber: Subscriber): unknown {
  return isMethodSubscriber(subscriber) ? Reflect.get(subscriber.owner, subscriber.key) : subscriber
}
