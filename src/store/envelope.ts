import { BinaryCodec } from '../codec/binary.codec'
import { InvalidMetadataError, UnpackError } from '../errors'
import { Headers, LogMessage } from '../log/event-log'
import { TypeRegistry } from '../registry/type-registry'

export const EVENT_TYPE_HEADER = 'Event-Type'
export const EVENT_TIME_HEADER = 'Event-Time'
export const EVENT_CODEC_HEADER = 'Event-Codec'
/** Each metadata entry travels as its own header, named with this prefix. */
export const EVENT_META_PREFIX = 'Event-Meta-'

export interface Envelope {
  type: string
  time: Date
  /** Absent on messages published without a codec header. */
  codec?: string
  meta: Record<string, string>
}

/** ISO-8601 in UTC with milliseconds: fixed width, so it sorts as text. */
export function formatTime(time: Date): string {
  return time.toISOString()
}

const COLON = 58

function invalidKeyCharacter(key: string): string | undefined {
  for (const char of key) {
    const code = char.charCodeAt(0)
    if (char.length > 1 || code < 33 || code > 126 || code === COLON) return char
  }
  return undefined
}

/**
 * Rejects metadata that cannot travel as a header unchanged: keys are
 * printable ASCII without spaces or colons, values are single lines without
 * surrounding whitespace.
 */
export function checkMetadata(meta: Record<string, string>): void {
  for (const [key, value] of Object.entries(meta)) {
    if (!key) throw new InvalidMetadataError(key, 'empty key')
    const char = invalidKeyCharacter(key)
    if (char !== undefined) {
      throw new InvalidMetadataError(
        key,
        `${JSON.stringify(char)} is not allowed in a key`,
      )
    }
    if (typeof value !== 'string') {
      throw new InvalidMetadataError(key, 'value must be a string')
    }
    if (/[\r\n]/.test(value)) {
      throw new InvalidMetadataError(key, 'value must be a single line')
    }
    if (value !== value.trim()) {
      throw new InvalidMetadataError(key, 'value has surrounding whitespace')
    }
  }
}

export function envelopeHeaders(envelope: Envelope): Headers {
  const headers: Headers = {
    [EVENT_TYPE_HEADER]: envelope.type,
    [EVENT_TIME_HEADER]: formatTime(envelope.time),
  }
  if (envelope.codec) headers[EVENT_CODEC_HEADER] = envelope.codec
  for (const [key, value] of Object.entries(envelope.meta)) {
    headers[`${EVENT_META_PREFIX}${key}`] = value
  }
  return headers
}

export function readEnvelope(message: LogMessage): Envelope {
  const { headers, subject, sequence } = message

  const type = headers[EVENT_TYPE_HEADER]
  if (!type) throw new UnpackError(subject, sequence, 'missing event type')

  const rawTime = headers[EVENT_TIME_HEADER]
  const time = new Date(rawTime ?? '')
  if (Number.isNaN(time.getTime())) {
    throw new UnpackError(subject, sequence, `invalid event time: ${rawTime}`)
  }

  const meta: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    if (key.startsWith(EVENT_META_PREFIX)) {
      meta[key.slice(EVENT_META_PREFIX.length)] = value
    }
  }

  return { type, time, codec: headers[EVENT_CODEC_HEADER], meta }
}

/** How payloads are turned into bodies and back for one store. */
export interface PayloadCodec {
  readonly codec: string
  marshal(data: unknown): Uint8Array
  unmarshal(body: Uint8Array, type: string): unknown
}

const binary = new BinaryCodec()

export function payloadCodec(types?: TypeRegistry): PayloadCodec {
  if (types) {
    return {
      codec: types.codec.name,
      marshal: (data) => types.marshal(data),
      unmarshal: (body, type) => types.unmarshalType(body, type),
    }
  }
  return {
    codec: binary.name,
    marshal: (data) => binary.marshal(data),
    unmarshal: (body) => Uint8Array.from(body),
  }
}
