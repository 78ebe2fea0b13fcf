/**
 * Observable Properties
 * =====================
 *
 * A `Property` is declared once per class, in `static properties`, and stores
 * one value per instance. Assigning a value that is equal to the current one
 * does nothing. Any other assignment is validated, stored and then announced
 * on the event that shares the property's name:
 *
 * ```ts
 * listener(instance, value, { property, old, mutation })
 * ```
 *
 * `ListProperty` and `DictProperty` store their values as observable
 * containers, so in-place mutation is announced too (with `mutation: true`).
 */

import { deepEqual, isPlainObject } from './equality'
import {
  DispatchError,
  InvalidTypeError,
  NoneNotAllowedError,
  OutOfRangeError,
  ValidationError
} from './errors'
import { detach, observe, type MutationRoot } from './observable'
import { registryOf } from './registry'

// =============================================================================
// TYPES
// =============================================================================

/**
 * The keyword record delivered with every property event.
 */
export type PropertyChange<T = unknown> = {
  readonly property: Property<T>
  /** Value before the assignment. Unset for mutations, which keep no copy. */
  readonly old: T | undefined
  /** True when the event was caused by mutating a container in place. */
  readonly mutation: boolean
}

export interface PropertyOptions<T> {
  /** Decides whether an assignment is a change. Defaults to `deepEqual`. */
  isEqual?(a: T, b: T): boolean
  /** Returns error messages for a rejected value; `null` or `[]` accepts it. */
  validate?(value: T): readonly string[] | null
  /** Free-form description, reported by `describeDispatcher`. */
  doc?: string
}

export interface ContainerPropertyOptions<T> extends PropertyOptions<T> {
  default?: T
}

export interface TypedPropertyOptions<T> extends ContainerPropertyOptions<T> {
  /** Whether `null` and `undefined` are accepted. */
  allowNull?: boolean
}

export interface NumericPropertyOptions extends TypedPropertyOptions<number | null> {
  min?: number
  max?: number
}

export type PropertyKind = 'any' | 'string' | 'boolean' | 'integer' | 'float' | 'list' | 'dict'

/**
 * What introspection reports about a property.
 */
export interface PropertyDescription {
  readonly name: string
  readonly kind: PropertyKind
  readonly default: unknown
  readonly doc?: string
  readonly allowNull?: boolean
  readonly min?: number
  readonly max?: number
}

interface ValueCell<T> {
  value: T
}

function cloneValue<T>(value: T): T {
  return Array.isArray(value) || isPlainObject(value) ? structuredClone(value) : value
}

// =============================================================================
// PROPERTY
// =============================================================================

/**
 * An equality-gated value slot with an event of the same name.
 *
 * @example
 * ```ts
 * class Counter extends Dispatcher<{ value: number }, {}> {
 *   static properties = { value: new Property(0) }
 * }
 * ```
 */
export class Property<T = unknown> implements MutationRoot {
  readonly defaultValue: T
  protected readonly options: PropertyOptions<T>
  private attachedName: string | undefined
  private readonly cells = new WeakMap<object, ValueCell<T>>()

  constructor(defaultValue: T, options: PropertyOptions<T> = {}) {
    this.defaultValue = defaultValue
    this.options = options
  }

  /** The declared name. Empty until the owning class is composed. */
  get name(): string {
    return this.attachedName ?? ''
  }

  get kind(): PropertyKind {
    return 'any'
  }

  /**
   * Gives the property its name. A property object belongs to one name only.
   */
  attach(name: string): void {
    if (this.attachedName !== undefined && this.attachedName !== name) {
      throw new DispatchError(
        `Property "${this.attachedName}" cannot also be declared as "${name}"`
      )
    }
    this.attachedName = name
  }

  get(instance: object): T {
    return this.cell(instance).value
  }

  /**
   * Stores `value` for `instance` and emits, unless it equals the current
   * value. Throws a {@link ValidationError} (and stores nothing) when the
   * value is rejected.
   */
  set(instance: object, value: T): void {
    const cell = this.cell(instance)
    const old = cell.value
    if (this.isEqual(old, value)) return

    this.check(value)
    cell.value = this.prepare(instance, value)
    if (old !== cell.value) detach(old)

    this.emit(instance, cell.value, { property: this, old, mutation: false })
  }

  notifyMutation(instance: object): void {
    const cell = this.cells.get(instance)
    if (!cell) return
    this.emit(instance, cell.value, { property: this, old: undefined, mutation: true })
  }

  describe(): PropertyDescription {
    return {
      name: this.name,
      kind: this.kind,
      default: cloneValue(this.defaultValue),
      doc: this.options.doc
    }
  }

  protected isEqual(a: T, b: T): boolean {
    return this.options.isEqual ? this.options.isEqual(a, b) : deepEqual(a, b)
  }

  /** Throws when `value` must not be stored. */
  protected check(value: T): void {
    const messages = this.options.validate?.(value)
    if (messages && messages.length > 0) {
      throw new ValidationError(this.name, value, messages)
    }
  }

  /** Turns a validated value into the stored one. */
  protected prepare(_instance: object, value: T): T {
    return value
  }

  private cell(instance: object): ValueCell<T> {
    let cell = this.cells.get(instance)
    if (!cell) {
      cell = { value: this.prepare(instance, cloneValue(this.defaultValue)) }
      this.cells.set(instance, cell)
    }
    return cell
  }

  private emit(instance: object, value: T, change: PropertyChange<T>): void {
    // Without an Event nobody is listening
    registryOf(instance)?.existing(this.name)?.emit([instance, value], change)
  }
}

// =============================================================================
// TYPED PROPERTIES
// =============================================================================

/**
 * Range in the form used by error messages: `-10 <= value <= 10`.
 */
function formatRange(min: number | undefined, max: number | undefined): string {
  if (min !== undefined && max !== undefined) return `${min} <= value <= ${max}`
  if (min !== undefined) return `${min} <= value`
  return `value <= ${max}`
}

abstract class TypedProperty<T extends {}> extends Property<T | null> {
  readonly allowNull: boolean

  constructor(defaultValue: T | null, allowNull: boolean, options: TypedPropertyOptions<T | null>) {
    super(defaultValue, options)
    this.allowNull = allowNull
  }

  protected abstract readonly expected: string
  protected abstract accepts(value: unknown): boolean

  protected check(value: T | null): void {
    if (value === null || value === undefined) {
      if (!this.allowNull) throw new NoneNotAllowedError(this.name, value)
    } else if (!this.accepts(value)) {
      throw new InvalidTypeError(this.name, value, this.expected)
    }
    super.check(value)
  }

  describe(): PropertyDescription {
    return { ...super.describe(), allowNull: this.allowNull }
  }
}

/** Strings. Accepts `null` unless `allowNull: false`; defaults to `null`. */
export class StringProperty extends TypedProperty<string> {
  protected readonly expected = 'string'

  constructor(options: TypedPropertyOptions<string | null> = {}) {
    const allowNull = options.allowNull ?? true
    super(options.default ?? (allowNull ? null : ''), allowNull, options)
  }

  get kind(): PropertyKind {
    return 'string'
  }

  protected accepts(value: unknown): boolean {
    return typeof value === 'string'
  }
}

/** Booleans, defaulting to `false`. */
export class BoolProperty extends TypedProperty<boolean> {
  protected readonly expected = 'boolean'

  constructor(options: TypedPropertyOptions<boolean | null> = {}) {
    super(options.default === undefined ? false : options.default, options.allowNull ?? false, options)
  }

  get kind(): PropertyKind {
    return 'boolean'
  }

  protected accepts(value: unknown): boolean {
    return typeof value === 'boolean'
  }
}

abstract class NumericProperty extends TypedProperty<number> {
  readonly min: number | undefined
  readonly max: number | undefined

  constructor(options: NumericPropertyOptions) {
    super(options.default === undefined ? 0 : options.default, options.allowNull ?? false, options)
    this.min = options.min
    this.max = options.max
  }

  protected check(value: number | null): void {
    super.check(value)
    if (typeof value !== 'number') return

    const tooLow = this.min !== undefined && value < this.min
    const tooHigh = this.max !== undefined && value > this.max
    if (tooLow || tooHigh) {
      throw new OutOfRangeError(this.name, value, formatRange(this.min, this.max))
    }
  }

  describe(): PropertyDescription {
    return { ...super.describe(), min: this.min, max: this.max }
  }
}

/** Integers, defaulting to `0`, optionally bounded by `min`/`max`. */
export class IntProperty extends NumericProperty {
  protected readonly expected = 'integer'

  constructor(options: NumericPropertyOptions = {}) {
    super(options)
  }

  get kind(): PropertyKind {
    return 'integer'
  }

  protected accepts(value: unknown): boolean {
    return Number.isInteger(value)
  }
}

/** Numbers, defaulting to `0`, optionally bounded by `min`/`max`. */
export class FloatProperty extends NumericProperty {
  protected readonly expected = 'number'

  constructor(options: NumericPropertyOptions = {}) {
    super(options)
  }

  get kind(): PropertyKind {
    return 'float'
  }

  protected accepts(value: unknown): boolean {
    return typeof value === 'number' && !Number.isNaN(value)
  }
}

// =============================================================================
// CONTAINER PROPERTIES
// =============================================================================

/**
 * An array stored as an observable list. Every assignment is copied.
 */
export class ListProperty<T = unknown> extends Property<T[]> {
  constructor(options: ContainerPropertyOptions<T[]> = {}) {
    super(options.default ?? [], options)
  }

  get kind(): PropertyKind {
    return 'list'
  }

  protected check(value: T[]): void {
    if (value === null || value === undefined) throw new NoneNotAllowedError(this.name, value)
    if (!Array.isArray(value)) throw new InvalidTypeError(this.name, value, 'array')
    super.check(value)
  }

  protected prepare(instance: object, value: T[]): T[] {
    return observe(value, instance, this)
  }
}

/**
 * A plain object stored as an observable dict. Every assignment is copied.
 */
export class DictProperty<V = unknown> extends Property<Record<string, V>> {
  constructor(options: ContainerPropertyOptions<Record<string, V>> = {}) {
    super(options.default ?? {}, options)
  }

  get kind(): PropertyKind {
    return 'dict'
  }

  protected check(value: Record<string, V>): void {
    if (value === null || value === undefined) throw new NoneNotAllowedError(this.name, value)
    if (!isPlainObject(value)) throw new InvalidTypeError(this.name, value, 'object')
    super.check(value)
  }

  protected prepare(instance: object, value: Record<string, V>): Record<string, V> {
    return observe(value, instance, this)
  }
}
