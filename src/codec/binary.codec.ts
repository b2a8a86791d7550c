import { Codec } from './codec'

export interface BinaryMarshaler {
  marshalBinary(): Uint8Array
}

export interface BinaryUnmarshaler {
  unmarshalBinary(data: Uint8Array): void
}

function isBinaryMarshaler(value: unknown): value is BinaryMarshaler {
  return (
    typeof value === 'object' &&
    value !== null &&
    'marshalBinary' in value &&
    typeof value.marshalBinary === 'function'
  )
}

function isBinaryUnmarshaler(value: object): value is BinaryUnmarshaler {
  return 'unmarshalBinary' in value && typeof value.unmarshalBinary === 'function'
}

/**
 * Passes raw bytes through untouched, or defers to values that know how to
 * encode themselves.
 */
export class BinaryCodec implements Codec {
  readonly name = 'binary'
  readonly contentType = 'application/octet-stream'

  marshal(value: unknown): Uint8Array {
    if (isBinaryMarshaler(value)) return value.marshalBinary()
    if (value instanceof Uint8Array) return value
    throw new TypeError('value is not a Uint8Array')
  }

  unmarshal(data: Uint8Array, target: object): void {
    if (!isBinaryUnmarshaler(target)) {
      throw new TypeError('value must implement unmarshalBinary')
    }
    target.unmarshalBinary(data)
  }
}
