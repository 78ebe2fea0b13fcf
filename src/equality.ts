// =============================================================================
// EQUALITY CHECKING
// =============================================================================

/**
 * Equality comparison used by properties to decide whether an assignment is
 * a change.
 */
export type EqualityFn<T = unknown> = (a: T, b: T) => boolean

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * True for object literals and `Object.create(null)` objects.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value) || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * A deep equality check for arrays and objects.
 * Recursively compares elements and properties. Observable containers compare
 * like the plain values they wrap.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  // 0 and -0 are equal, NaN equals itself
  if (a === b || (Number.isNaN(a) && Number.isNaN(b))) return true

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  // Class instances only compare by identity
  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    for (const key of keysA) {
      if (!(key in b) || !deepEqual(a[key], b[key])) return false
    }
    return true
  }

  return false
}
