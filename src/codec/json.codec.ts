import { instanceToPlain, plainToClassFromExist } from 'class-transformer'
import { Codec } from './codec'
import { isRecord, reviveDates } from './plain'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export class JsonCodec implements Codec {
  readonly name = 'json'
  readonly contentType = 'application/json'

  marshal(value: unknown): Uint8Array {
    return encoder.encode(JSON.stringify(instanceToPlain(value)))
  }

  unmarshal(data: Uint8Array, target: object): void {
    if (data.length === 0) return
    const plain: unknown = JSON.parse(decoder.decode(data))
    if (!isRecord(plain)) {
      throw new TypeError('expected a JSON object')
    }
    reviveDates(plain, target)
    plainToClassFromExist(target, plain)
  }
}
