import { Observable } from 'rxjs'

export type Headers = Record<string, string>

export interface LogMessage {
  subject: string
  sequence: number
  /** Idempotency key the message was published with. */
  id?: string
  headers: Readonly<Headers>
  data: Uint8Array
}

export interface PublishRequest {
  subject: string
  id: string
  data: Uint8Array
  headers: Headers
  /** Last sequence stored under `subject`, 0 meaning none at all. */
  expectedLastSubjectSequence?: number
}

export interface PublishAck {
  stream: string
  sequence: number
  duplicate: boolean
}

export interface ReadOptions {
  /** First sequence to deliver. Defaults to the start of the stream. */
  startSequence?: number
}

export type StorageType = 'file' | 'memory'

export interface Placement {
  cluster?: string
  tags?: string[]
}

export interface StreamConfig {
  name: string
  description?: string
  subjects: string[]
  storage: StorageType
  replicas: number
  placement?: Placement
  denyDelete: boolean
  denyPurge: boolean
}

export interface StreamInfo {
  config: StreamConfig
  messages: number
  lastSequence: number
}

/**
 * The durable, ordered log an event store sits on. Sequences are assigned per
 * stream and every subject within a stream shares them.
 */
export interface EventLog {
  publish(
    stream: string,
    request: PublishRequest,
    signal?: AbortSignal,
  ): Promise<PublishAck>

  /** Sequence of the newest message matching `subject`, or 0. */
  lastSequence(
    stream: string,
    subject: string,
    signal?: AbortSignal,
  ): Promise<number>

  /**
   * Ordered, live read of messages matching `subject`. It does not complete on
   * its own while the stream exists; unsubscribe to stop it.
   */
  read(
    stream: string,
    subject: string,
    options?: ReadOptions,
  ): Observable<LogMessage>

  addStream(config: StreamConfig): Promise<void>
  updateStream(config: StreamConfig): Promise<void>
  deleteStream(name: string): Promise<void>
  streamInfo(name: string): Promise<StreamInfo>
}

/** JetStream error code for a failed last-subject-sequence expectation. */
export const WRONG_LAST_SEQUENCE = 10071

export class EventLogError extends Error {
  constructor(
    message: string,
    public readonly errCode?: number,
  ) {
    super(message)
    this.name = 'EventLogError'
  }
}

function errorCode(error: object): unknown {
  if ('errCode' in error && error.errCode !== undefined) return error.errCode
  if (
    'api_error' in error &&
    typeof error.api_error === 'object' &&
    error.api_error !== null &&
    'err_code' in error.api_error
  ) {
    return error.api_error.err_code
  }
  return undefined
}

/**
 * Recognises a rejected sequence expectation. A structured error code wins
 * when the log supplies one; otherwise the message text is matched.
 */
export function isWrongLastSequence(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  const code = errorCode(error)
  if (code !== undefined) return code === WRONG_LAST_SEQUENCE
  return error instanceof Error && error.message.includes('wrong last sequence')
}
