/**
 * An event as the caller builds it. Missing `id`, `type` and `time` are filled
 * in on append, and `subject` and `sequence` are set once the log accepts it.
 */
export interface Event<T = unknown> {
  id?: string
  type?: string
  time?: Date
  data: T
  meta?: Record<string, string>
  subject?: string
  sequence?: number
}

export interface StoredEvent<T = unknown> extends Event<T> {
  id: string
  type: string
  time: Date
  meta: Record<string, string>
  subject: string
  sequence: number
}

/** Optional self-check on a payload, run before anything is published. */
export interface Validator {
  validate(): void | Promise<void>
}

export function isValidator(value: unknown): value is Validator {
  return (
    typeof value === 'object' &&
    value !== null &&
    'validate' in value &&
    typeof value.validate === 'function'
  )
}
