/** True for a decoded map: an object that is neither null nor an array. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Text formats carry dates as strings. Where the target already holds a
 * `Date`, the decoded value is turned back into one before it is applied.
 */
export function reviveDates(plain: Record<string, unknown>, target: object) {
  for (const [key, value] of Object.entries(plain)) {
    const current: unknown = Reflect.get(target, key)
    if (current instanceof Date) {
      if (typeof value === 'string' || typeof value === 'number') {
        plain[key] = new Date(value)
      }
    } else if (isRecord(current) && isRecord(value)) {
      reviveDates(value, current)
    }
  }
}
