/**
 * Observable Containers
 * =====================
 *
 * Arrays and plain objects stored in a `ListProperty` or `DictProperty` are
 * replaced by proxies that report in-place mutation. Wrapping is recursive:
 * every nested array or plain object becomes an observable whose parent is
 * the container holding it. A mutation anywhere below a property walks the
 * parent links up to the property and emits its event with the whole current
 * value.
 *
 * Links point upwards only and are weak, so a container never keeps its
 * parent or its owning instance alive. Inserting a container always copies
 * it, which keeps a single upward path and a single slot per container. Array
 * mutators may move a container between slots of its own parent; it is
 * detached only once it sits in no slot at all, and then goes quiet.
 */

import { isPlainObject } from './equality'

// =============================================================================
// TYPES
// =============================================================================

/** An observable array. Reads and writes like the array it wraps. */
export type ObservableList<T = unknown> = T[]

/** An observable plain object. Reads and writes like the object it wraps. */
export type ObservableDict<V = unknown> = Record<string, V>

/**
 * The property end of a root link.
 */
export interface MutationRoot {
  notifyMutation(instance: object): void
}

type Link =
  | { readonly kind: 'parent'; readonly node: WeakRef<ObservableNode> }
  | { readonly kind: 'root'; readonly instance: WeakRef<object>; readonly root: MutationRoot }

type Container = unknown[] | Record<string, unknown>

const ARRAY_MUTATORS: ReadonlySet<PropertyKey> = new Set([
  'push',
  'pop',
  'shift',
  'unshift',
  'splice',
  'sort',
  'reverse',
  'fill',
  'copyWithin'
])

const nodes = new WeakMap<object, ObservableNode>()

// =============================================================================
// NODES
// =============================================================================

class ObservableNode {
  proxy: Container = []
  private link: Link | undefined
  private suspended = 0
  private mutating = 0
  private dirty = false
  private readonly methods = new Map<PropertyKey, (...args: unknown[]) => unknown>()

  constructor(link: Link) {
    this.link = link
  }

  isChildOf(parent: ObservableNode): boolean {
    return this.link?.kind === 'parent' && this.link.node.deref() === parent
  }

  detach(): void {
    this.link = undefined
  }

  changed(): void {
    if (this.suspended > 0) {
      this.dirty = true
      return
    }

    const link = this.link
    if (!link) return
    if (link.kind === 'parent') {
      link.node.deref()?.changed()
      return
    }

    const instance = link.instance.deref()
    if (instance) link.root.notifyMutation(instance)
  }

  /**
   * Runs `fn` with notification suspended; reports at most one change.
   */
  batch<R>(fn: () => R): R {
    this.suspended++
    try {
      return fn()
    } finally {
      this.suspended--
      this.flush()
    }
  }

  /**
   * Detaches `value` from `target`, which this node wraps, once no slot
   * holds it any more. Array mutators release what they removed when done.
   */
  release(target: Container, value: unknown): void {
    if (this.mutating > 0) return
    const child = nodeOf(value)
    if (child?.isChildOf(this) && !holds(target, value)) child.detach()
  }

  /**
   * Stores `value` at `key` of `target`: containers are copied into new
   * observables, except those this node already holds at that very slot or
   * is moving with an array mutator.
   */
  adopt(target: Container, key: PropertyKey, value: unknown): unknown {
    const child = nodeOf(value)
    if (child?.isChildOf(this) && (this.mutating > 0 || !heldElsewhere(target, key, value))) {
      return value
    }
    if (Array.isArray(value) || isPlainObject(value)) {
      return createObservable(value, { kind: 'parent', node: new WeakRef(this) })
    }
    return value
  }

  /**
   * Wrapper for an array mutator. Reports once per call that changed the
   * array, and not at all for one that left it as it was.
   */
  arrayMethod(target: unknown[], key: PropertyKey, fn: Function): (...args: unknown[]) => unknown {
    let wrapped = this.methods.get(key)
    if (!wrapped) {
      wrapped = (...args: unknown[]) => {
        // Containers passed back in are inserted as copies
        const input = args.map(arg => (nodeOf(arg)?.isChildOf(this) ? unwrap(arg) : arg))
        const before = target.slice()
        const wasDirty = this.dirty
        this.suspended++
        this.mutating++
        try {
          return Reflect.apply(fn, this.proxy, input)
        } finally {
          this.mutating--
          this.suspended--
          for (const item of before) {
            this.release(target, item)
          }
          if (sameItems(before, target)) this.dirty = wasDirty
          this.flush()
        }
      }
      this.methods.set(key, wrapped)
    }
    return wrapped
  }

  private flush(): void {
    if (this.suspended === 0 && this.dirty) {
      this.dirty = false
      this.changed()
    }
  }
}

function nodeOf(value: unknown): ObservableNode | undefined {
  return typeof value === 'object' && value !== null ? nodes.get(value) : undefined
}

function holds(target: Container, value: unknown): boolean {
  return Array.isArray(target) ? target.includes(value) : Object.values(target).includes(value)
}

function heldElsewhere(target: Container, key: PropertyKey, value: unknown): boolean {
  const slots: Array<[string, unknown]> = Array.isArray(target)
    ? target.map((item, index): [string, unknown] => [String(index), item])
    : Object.entries(target)
  return slots.some(([slot, item]) => item === value && slot !== key)
}

function sameItems(a: readonly unknown[], b: readonly unknown[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index])
}

/** A plain deep copy of an observable, for inserting it a second time. */
function unwrap(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(unwrap)
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, unwrap(item)]))
  }
  return value
}

function createHandler<T extends Container>(node: ObservableNode): ProxyHandler<T> {
  return {
    get(target, key, receiver) {
      const value: unknown = Reflect.get(target, key, receiver)
      if (Array.isArray(target) && ARRAY_MUTATORS.has(key) && typeof value === 'function') {
        return node.arrayMethod(target, key, value)
      }
      return value
    },

    set(target, key, value) {
      const previous: unknown = Reflect.get(target, key)
      const removed: unknown[] = Array.isArray(target) && key === 'length' && typeof value === 'number'
        ? target.slice(value)
        : [previous]

      const next = node.adopt(target, key, value)
      if (!Reflect.set(target, key, next)) return false

      for (const item of removed) {
        node.release(target, item)
      }
      node.changed()
      return true
    },

    deleteProperty(target, key) {
      if (!Object.prototype.hasOwnProperty.call(target, key)) return true

      const previous: unknown = Reflect.get(target, key)
      if (!Reflect.deleteProperty(target, key)) return false

      node.release(target, previous)
      node.changed()
      return true
    }
  }
}

function createObservable(value: Container, link: Link): Container {
  const node = new ObservableNode(link)

  if (Array.isArray(value)) {
    const target: unknown[] = []
    for (const item of value) {
      target.push(node.adopt(target, String(target.length), item))
    }
    node.proxy = new Proxy(target, createHandler<unknown[]>(node))
  } else {
    const target: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      target[key] = node.adopt(target, key, item)
    }
    node.proxy = new Proxy(target, createHandler<Record<string, unknown>>(node))
  }

  nodes.set(node.proxy, node)
  return node.proxy
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Copies `value` into an observable owned by `instance` through `root`.
 * Values other than arrays and plain objects are returned unchanged.
 */
export function observe<V>(value: V, instance: object, root: MutationRoot): V
export function observe(value: unknown, instance: object, root: MutationRoot): unknown {
  if (!Array.isArray(value) && !isPlainObject(value)) return value
  return createObservable(value, { kind: 'root', instance: new WeakRef(instance), root })
}

/**
 * True for containers created by a list or dict property, at any depth.
 */
export function isObservable(value: unknown): value is ObservableList | ObservableDict {
  return nodeOf(value) !== undefined
}

/**
 * Stops `value` from reporting to its former owner. No-op for other values.
 */
export function detach(value: unknown): void {
  nodeOf(value)?.detach()
}

/**
 * Runs `fn` and reports the mutations it makes to `container` as a single
 * change. Plain values just run `fn`.
 *
 * @example
 * ```ts
 * batch(settings, () => {
 *   Object.assign(settings, { theme: 'dark', fontSize: 14 })
 * })
 * ```
 */
export function batch<R>(container: object, fn: () => R): R {
  const node = nodeOf(container)
  return node ? node.batch(fn) : fn()
}
