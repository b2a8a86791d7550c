/**
 * Byte-level encoding of payload values. `unmarshal` fills an existing
 * instance rather than returning a new one, so registered classes keep their
 * prototype after a round trip.
 */
export interface Codec {
  readonly name: string
  readonly contentType: string
  marshal(value: unknown): Uint8Array
  unmarshal(data: Uint8Array, target: object): void
}
