import { isDeepStrictEqual } from 'util'
import { Codec } from '../codec/codec'
import { JsonCodec } from '../codec/json.codec'
import {
  MarshalError,
  NoRegisteredTypeError,
  TypeInvalidError,
  TypeNotRegisteredError,
  UnmarshalError,
} from '../errors'
import { Type } from '../type'

const NAME_PATTERN = /^[\w-]+(\.[\w-]+)*$/

export interface TypeDescriptor<T extends object = object> {
  /** Returns a fresh, mutable instance with defaults applied. */
  init: () => T
}

export type TypeDescriptors = Readonly<Record<string, TypeDescriptor>>

export interface TypeRegistryOptions {
  codec: Codec
}

export function typeOf<T extends object>(
  Class: new () => T,
): TypeDescriptor<T> {
  return { init: () => new Class() }
}

function constructorOf(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return undefined
  const prototype: unknown = Object.getPrototypeOf(value)
  if (prototype === null || typeof prototype !== 'object') return undefined
  return prototype.constructor
}

function shapeOf(value: unknown): string {
  if (value === null) return 'null'
  const ctor = constructorOf(value)
  return typeof ctor === 'function' && ctor.name ? ctor.name : typeof value
}

/**
 * Maps symbolic type names to payload classes and back. Every type is checked
 * for a codec round trip up front, so anything the registry accepts on append
 * can be rebuilt on load.
 */
export class TypeRegistry {
  readonly codec: Codec
  private readonly types: ReadonlyMap<string, TypeDescriptor>
  private readonly names: ReadonlyMap<unknown, string>

  constructor(
    types: TypeDescriptors,
    options: Partial<TypeRegistryOptions> = {},
  ) {
    this.codec = options.codec ?? new JsonCodec()

    const byName = new Map<string, TypeDescriptor>()
    const byClass = new Map<unknown, string>()
    for (const [name, descriptor] of Object.entries(types)) {
      const ctor = this.validate(name, descriptor)
      const existing = byClass.get(ctor)
      if (existing !== undefined) {
        throw new TypeInvalidError(
          name,
          `class already registered as ${existing}`,
        )
      }
      byName.set(name, descriptor)
      byClass.set(ctor, name)
    }

    this.types = byName
    this.names = byClass
  }

  has(name: string): boolean {
    return this.types.has(name)
  }

  typeNames(): string[] {
    return [...this.types.keys()]
  }

  init(name: string): object {
    const descriptor = this.types.get(name)
    if (!descriptor) throw new TypeNotRegisteredError(name)
    return descriptor.init()
  }

  lookup(value: unknown): string {
    const name = this.names.get(constructorOf(value))
    if (name === undefined) throw new NoRegisteredTypeError(shapeOf(value))
    return name
  }

  lookupType(Class: Type<object>): string {
    const name = this.names.get(Class)
    if (name === undefined) throw new NoRegisteredTypeError(Class.name)
    return name
  }

  marshal(value: unknown): Uint8Array {
    this.lookup(value)
    try {
      return this.codec.marshal(value)
    } catch (err) {
      throw new MarshalError(shapeOf(value), err)
    }
  }

  unmarshal(data: Uint8Array, target: object): void {
    this.lookup(target)
    try {
      this.codec.unmarshal(data, target)
    } catch (err) {
      throw new UnmarshalError(shapeOf(target), err)
    }
  }

  unmarshalType(data: Uint8Array, name: string): object {
    const value = this.init(name)
    this.unmarshal(data, value)
    return value
  }

  private validate(name: string, descriptor: TypeDescriptor | undefined) {
    if (!name) throw new TypeInvalidError(name, 'missing name')
    if (!NAME_PATTERN.test(name)) {
      throw new TypeInvalidError(name, 'name has invalid characters')
    }
    if (!descriptor || typeof descriptor.init !== 'function') {
      throw new TypeInvalidError(name, 'init function is missing')
    }

    const value: unknown = descriptor.init()
    if (value === null || value === undefined) {
      throw new TypeInvalidError(name, 'init function returned nothing')
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw new TypeInvalidError(name, 'init function must return an object')
    }
    const ctor = constructorOf(value)
    if (typeof ctor !== 'function' || ctor === Object) {
      throw new TypeInvalidError(name, 'value must be a class instance')
    }
    if (descriptor.init() === value) {
      throw new TypeInvalidError(name, 'init function must return a new value')
    }

    let data: Uint8Array
    try {
      data = this.codec.marshal(value)
    } catch (err) {
      throw new TypeInvalidError(name, 'failed to marshal with codec', err)
    }
    const copy = descriptor.init()
    try {
      this.codec.unmarshal(data, copy)
    } catch (err) {
      throw new TypeInvalidError(name, 'failed to unmarshal with codec', err)
    }
    if (!isDeepStrictEqual(copy, value)) {
      throw new TypeInvalidError(name, 'value does not survive a codec round trip')
    }

    return ctor
  }
}
