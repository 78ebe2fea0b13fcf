// =============================================================================
// IMPLEMENTATION: PER-INSTANCE EVENT REGISTRY
// =============================================================================

import { DoesNotExistError } from './errors'
import { Event } from './event'

/**
 * The event table of one dispatcher instance: the set of names it answers to
 * and the `Event` objects created for them so far. `Event`s are created on
 * first use, so an instance nobody has bound to carries no events at all.
 */
export class EventRegistry {
  private readonly names: Set<string>
  private readonly events = new Map<string, Event>()

  constructor(names: Iterable<string>) {
    this.names = new Set(names)
  }

  has(name: string): boolean {
    return this.names.has(name)
  }

  get eventNames(): string[] {
    return [...this.names]
  }

  /** Adds names. Callers check for conflicts first. */
  register(names: Iterable<string>): void {
    for (const name of names) {
      this.names.add(name)
    }
  }

  /**
   * The `Event` for `name`, created if needed.
   * Throws {@link DoesNotExistError} for names never registered.
   */
  event(name: string): Event {
    let event = this.events.get(name)
    if (event) return event

    if (!this.names.has(name)) {
      throw new DoesNotExistError(name)
    }
    event = new Event(name)
    this.events.set(name, event)
    return event
  }

  /** The `Event` for `name` if one was created. */
  existing(name: string): Event | undefined {
    return this.events.get(name)
  }

  liveEvents(): IterableIterator<Event> {
    return this.events.values()
  }
}

const registries = new WeakMap<object, EventRegistry>()

/** The registry of `instance`, if it has one yet. */
export function registryOf(instance: object): EventRegistry | undefined {
  return registries.get(instance)
}

/**
 * The registry of `instance`, created from `names()` on first call.
 */
export function ensureRegistry(instance: object, names: () => Iterable<string>): EventRegistry {
  let registry = registries.get(instance)
  if (!registry) {
    registry = new EventRegistry(names())
    registries.set(instance, registry)
  }
  return registry
}
