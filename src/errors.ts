export class EventStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Raised while building a {@link TypeRegistry}. Construction is
 * all-or-nothing, so the registry never exists in a partial state.
 */
export class TypeInvalidError extends EventStoreError {
  constructor(
    public readonly typeName: string,
    reason: string,
    cause?: unknown,
  ) {
    super(
      typeName
        ? `type not valid: ${typeName}: ${reason}`
        : `type not valid: ${reason}`,
      { cause },
    )
  }
}

export class TypeNotRegisteredError extends EventStoreError {
  constructor(public readonly typeName: string) {
    super(`type not registered: ${typeName}`)
  }
}

export class NoRegisteredTypeError extends EventStoreError {
  constructor(public readonly shape: string) {
    super(`no registered type for ${shape}`)
  }
}

export class MarshalError extends EventStoreError {
  constructor(public readonly shape: string, cause: unknown) {
    super(`${shape}: marshal error: ${describe(cause)}`, { cause })
  }
}

export class UnmarshalError extends EventStoreError {
  constructor(public readonly shape: string, cause: unknown) {
    super(`${shape}: unmarshal error: ${describe(cause)}`, { cause })
  }
}

export class CodecNotRegisteredError extends EventStoreError {
  constructor(public readonly codec: string) {
    super(`codec not registered: ${codec}`)
  }
}

export class EventDataRequiredError extends EventStoreError {
  constructor() {
    super('event data required')
  }
}

export class EventTypeRequiredError extends EventStoreError {
  constructor() {
    super('event type required')
  }
}

export class EventIdRequiredError extends EventStoreError {
  constructor() {
    super('event id required')
  }
}

/** Metadata travels as log headers, so keys and values must be header-safe. */
export class InvalidMetadataError extends EventStoreError {
  constructor(
    public readonly key: string,
    reason: string,
  ) {
    super(`invalid metadata ${JSON.stringify(key)}: ${reason}`)
  }
}

export class InvalidOptionsError extends EventStoreError {}

export class EventTypeMismatchError extends EventStoreError {
  constructor(
    public readonly declared: string,
    public readonly registered: string,
  ) {
    super(`wrong type for event data: ${declared} (registered as ${registered})`)
  }
}

export class SequenceConflictError extends EventStoreError {
  constructor(
    public readonly subject: string,
    public readonly expectedSequence: number,
    cause?: unknown,
  ) {
    super(
      `sequence conflict on ${subject}: expected last sequence ${expectedSequence}`,
      { cause },
    )
  }
}

export class UnpackError extends EventStoreError {
  constructor(
    public readonly subject: string,
    public readonly sequence: number,
    reason: string,
    cause?: unknown,
  ) {
    super(`unpack ${subject}#${sequence}: ${reason}`, { cause })
  }
}

export class EvolveError<TEvent = unknown> extends EventStoreError {
  constructor(
    public readonly sequence: number,
    public readonly event: TEvent,
    cause: unknown,
  ) {
    super(`evolve failed after sequence ${sequence}: ${describe(cause)}`, {
      cause,
    })
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
