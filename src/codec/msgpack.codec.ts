import { decode, encode } from '@msgpack/msgpack'
import { instanceToPlain, plainToClassFromExist } from 'class-transformer'
import { Codec } from './codec'
import { isRecord } from './plain'

/** Dates travel as msgpack timestamps and come back as `Date`. */
export class MsgpackCodec implements Codec {
  readonly name = 'msgpack'
  readonly contentType = 'application/msgpack'

  marshal(value: unknown): Uint8Array {
    return encode(instanceToPlain(value))
  }

  unmarshal(data: Uint8Array, target: object): void {
    if (data.length === 0) return
    const plain = decode(data)
    if (!isRecord(plain)) {
      throw new TypeError('expected a msgpack map')
    }
    plainToClassFromExist(target, plain)
  }
}
