// =============================================================================
// INTROSPECTION
// =============================================================================

import { composeManifest, type DispatcherClass } from './dispatcher'
import type { PropertyDescription } from './properties'

export interface DispatcherDescription {
  readonly name: string
  /** Plain events, in declaration order (base classes first). */
  readonly events: readonly string[]
  readonly properties: readonly PropertyDescription[]
}

/**
 * Describes the events and properties a dispatcher class declares, without
 * creating an instance. Intended for documentation generators.
 *
 * @example
 * ```ts
 * describeDispatcher(Counter)
 * // { name: 'Counter', events: ['reset'], properties: [{ name: 'value', kind: 'any', default: 0 }] }
 * ```
 */
export function describeDispatcher(cls: DispatcherClass): DispatcherDescription {
  const manifest = composeManifest(cls)
  return {
    name: cls.name,
    events: [...manifest.events],
    properties: [...manifest.properties.values()].map(property => property.describe())
  }
}
