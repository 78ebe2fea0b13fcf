// =============================================================================
// ERROR TAXONOMY
// =============================================================================

/**
 * Base class of every error raised by dispatch-ts. Errors are always thrown
 * synchronously by the operation that caused them.
 */
export class DispatchError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Raised when an event or property name is used before it was declared.
 */
export class DoesNotExistError extends DispatchError {
  readonly eventName: string

  constructor(eventName: string) {
    super(`Event "${eventName}" does not exist`)
    this.eventName = eventName
  }
}

/**
 * Raised when a name is declared twice with conflicting kinds.
 */
export class ExistsError extends DispatchError {
  readonly eventName: string

  constructor(eventName: string, message: string) {
    super(message)
    this.eventName = eventName
  }
}

/** A property was declared over an existing event name. */
export class EventExistsError extends ExistsError {
  constructor(eventName: string) {
    super(eventName, `An event named "${eventName}" already exists`)
  }
}

/** An event was declared over an existing property name. */
export class PropertyExistsError extends ExistsError {
  constructor(eventName: string) {
    super(eventName, `A property named "${eventName}" already exists`)
  }
}

/**
 * Raised when a property rejects an assigned value. The assignment does not
 * happen and no event is emitted.
 */
export class ValidationError extends DispatchError {
  readonly propertyName: string
  readonly value: unknown
  readonly messages: readonly string[]

  constructor(propertyName: string, value: unknown, messages: readonly string[]) {
    super(messages.join('; '))
    this.propertyName = propertyName
    this.value = value
    this.messages = messages
  }
}

/**
 * Name used in messages for the runtime type of a value.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor')
    return typeof ctor === 'function' && ctor !== Object ? ctor.name : 'object'
  }
  return typeof value
}

export class InvalidTypeError extends ValidationError {
  constructor(propertyName: string, value: unknown, expected: string) {
    super(propertyName, value, [
      `Type "${describeType(value)}" not valid for property "${propertyName}" (expected ${expected})`
    ])
  }
}

export class NoneNotAllowedError extends ValidationError {
  constructor(propertyName: string, value: null | undefined) {
    super(propertyName, value, [`"${String(value)}" not allowed for property "${propertyName}"`])
  }
}

export class OutOfRangeError extends ValidationError {
  constructor(propertyName: string, value: number, range: string) {
    super(propertyName, value, [`Value ${value} must be in range "${range}"`])
  }
}

/**
 * Raised when an async listener is bound without a resolvable execution
 * context, or when `bindAsync` is given a listener that is not async.
 */
export class BindingContextError extends DispatchError {}
