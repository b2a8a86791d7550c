import { Clock, systemClock } from './clock'
import { Codec } from './codec/codec'
import { IdGenerator, nanoidGenerator } from './id'
import { Placement, StorageType, StreamConfig } from './log/event-log'
import { InvalidOptionsError } from './errors'
import { createLogger, Logger } from './logger'
import { TypeDescriptors, TypeRegistry } from './registry/type-registry'

export interface EventStoreOptions {
  /**
   * Registry for typed payloads. Without one, payloads are raw bytes and every
   * event needs an explicit type.
   */
  types: TypeRegistry | TypeDescriptors
  /**
   * Codec for a registry built from descriptors. A built registry keeps its
   * own and raw payloads are always `binary`, so it is refused otherwise.
   */
  codec: Codec
  id: IdGenerator
  clock: Clock
  logger: Logger
}

export interface ResolvedOptions {
  types?: TypeRegistry
  id: IdGenerator
  clock: Clock
  logger: Logger
}

export const defaultOptions = () => ({
  id: nanoidGenerator,
  clock: systemClock,
  logger: createLogger(),
})

export function resolveOptions(
  options: Partial<EventStoreOptions> = {},
): ResolvedOptions {
  const { types, codec, ...rest } = { ...defaultOptions(), ...options }
  if (codec && (types === undefined || types instanceof TypeRegistry)) {
    throw new InvalidOptionsError('codec option requires type descriptors')
  }
  return {
    ...rest,
    types:
      types === undefined || types instanceof TypeRegistry
        ? types
        : new TypeRegistry(types, { codec }),
  }
}

export interface EventStoreConfig {
  name: string
  description?: string
  /** Defaults to every subject under the store name, `<name>.>`. */
  subjects?: string[]
  storage?: StorageType
  replicas?: number
  placement?: Placement
}

/** Event stores never allow messages to be deleted or purged. */
export function streamConfig(config: EventStoreConfig): StreamConfig {
  return {
    name: config.name,
    description: config.description,
    subjects: config.subjects?.length
      ? config.subjects
      : [`${config.name}.>`],
    storage: config.storage ?? 'file',
    replicas: config.replicas ?? 1,
    placement: config.placement,
    denyDelete: true,
    denyPurge: true,
  }
}
