import {
  ConsumerOptsBuilder,
  consumerOpts,
  headers as createHeaders,
  JetStreamPublishOptions,
  MsgHdrs,
  NatsConnection,
  StorageType as NatsStorageType,
  StreamConfig as NatsStreamConfig,
} from 'nats'
import { Observable } from 'rxjs'
import { abortable } from './abort'
import {
  EventLog,
  Headers,
  LogMessage,
  PublishAck,
  PublishRequest,
  ReadOptions,
  StreamConfig,
  StreamInfo,
} from './event-log'

const MSG_ID = 'Nats-Msg-Id'
// Set by hand: the client skips an expectation of 0, which means "no messages yet".
const EXPECTED_LAST_SUBJECT_SEQUENCE = 'Nats-Expected-Last-Subject-Sequence'
const NO_MESSAGE_FOUND = 10037

export function isNoMessageFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  if (
    'api_error' in error &&
    typeof error.api_error === 'object' &&
    error.api_error !== null
  ) {
    const apiError = error.api_error
    if ('err_code' in apiError && apiError.err_code === NO_MESSAGE_FOUND) {
      return true
    }
    if ('code' in apiError && apiError.code === 404) return true
  }
  return error instanceof Error && error.message.includes('no message found')
}

/** The parts of a JetStream message the log reads. */
export interface JetStreamMessage {
  subject: string
  seq: number
  headers?: MsgHdrs
  data: Uint8Array
  info: { stream: string }
}

export interface JetStreamSubscription extends AsyncIterable<JetStreamMessage> {
  unsubscribe(): void
}

/** The slice of the JetStream client used here; `nc.jetstream()` fits it. */
export interface JetStreamPort {
  publish(
    subject: string,
    data: Uint8Array,
    options: Partial<JetStreamPublishOptions>,
  ): Promise<{ stream: string; seq: number; duplicate: boolean }>
  subscribe(
    subject: string,
    options: ConsumerOptsBuilder,
  ): Promise<JetStreamSubscription>
}

/** The slice of the stream API used here; `jsm.streams` fits it. */
export interface StreamAdminPort {
  getMessage(
    stream: string,
    query: { last_by_subj: string },
  ): Promise<{ seq: number }>
  add(config: Partial<NatsStreamConfig>): Promise<unknown>
  update(name: string, config: Partial<NatsStreamConfig>): Promise<unknown>
  delete(name: string): Promise<boolean>
  info(name: string): Promise<{
    config: NatsStreamConfig
    state: { messages: number; last_seq: number }
  }>
}

export function toLogMessage(msg: JetStreamMessage): LogMessage {
  const headers: Headers = {}
  for (const key of msg.headers?.keys() ?? []) {
    headers[key] = msg.headers?.get(key) ?? ''
  }
  return {
    subject: msg.subject,
    sequence: msg.seq,
    id: headers[MSG_ID] || undefined,
    headers,
    data: msg.data,
  }
}

function toNatsConfig(config: StreamConfig): Partial<NatsStreamConfig> {
  return {
    name: config.name,
    description: config.description,
    subjects: config.subjects,
    storage:
      config.storage === 'memory' ? NatsStorageType.Memory : NatsStorageType.File,
    num_replicas: config.replicas,
    placement: config.placement && {
      cluster: config.placement.cluster ?? '',
      tags: config.placement.tags ?? [],
    },
    deny_delete: config.denyDelete,
    deny_purge: config.denyPurge,
  }
}

function fromNatsConfig(config: NatsStreamConfig): StreamConfig {
  return {
    name: config.name,
    description: config.description,
    subjects: config.subjects ?? [],
    storage: config.storage === NatsStorageType.Memory ? 'memory' : 'file',
    replicas: config.num_replicas,
    placement: config.placement && {
      cluster: config.placement.cluster,
      tags: config.placement.tags,
    },
    denyDelete: config.deny_delete,
    denyPurge: config.deny_purge,
  }
}

/** {@link EventLog} over NATS JetStream. The connection is shared, never owned. */
export class NatsEventLog implements EventLog {
  constructor(
    private readonly js: JetStreamPort,
    private readonly streams: StreamAdminPort,
  ) {}

  static async connect(nc: NatsConnection): Promise<NatsEventLog> {
    const manager = await nc.jetstreamManager()
    return new NatsEventLog(nc.jetstream(), manager.streams)
  }

  async publish(
    stream: string,
    request: PublishRequest,
    signal?: AbortSignal,
  ): Promise<PublishAck> {
    const headers = createHeaders()
    for (const [key, value] of Object.entries(request.headers)) {
      headers.set(key, value)
    }
    if (request.expectedLastSubjectSequence !== undefined) {
      headers.set(
        EXPECTED_LAST_SUBJECT_SEQUENCE,
        String(request.expectedLastSubjectSequence),
      )
    }

    const ack = await abortable(
      this.js.publish(request.subject, request.data, {
        msgID: request.id,
        headers,
        expect: { streamName: stream },
      }),
      signal,
    )
    return { stream: ack.stream, sequence: ack.seq, duplicate: ack.duplicate }
  }

  async lastSequence(
    stream: string,
    subject: string,
    signal?: AbortSignal,
  ): Promise<number> {
    try {
      const msg = await abortable(
        this.streams.getMessage(stream, { last_by_subj: subject }),
        signal,
      )
      return msg.seq
    } catch (err) {
      if (isNoMessageFound(err)) return 0
      throw err
    }
  }

  read(
    stream: string,
    subject: string,
    options: ReadOptions = {},
  ): Observable<LogMessage> {
    return new Observable<LogMessage>((subscriber) => {
      const opts = consumerOpts()
      opts.orderedConsumer()
      if (options.startSequence !== undefined) {
        opts.startSequence(options.startSequence)
      } else {
        opts.deliverAll()
      }

      let closed = false
      let unsubscribe = () => {}

      const pump = async () => {
        const sub = await this.js.subscribe(subject, opts)
        unsubscribe = () => sub.unsubscribe()
        if (closed) return unsubscribe()
        for await (const msg of sub) {
          if (msg.info.stream !== stream) {
            throw new Error(`subject ${subject} is bound to ${msg.info.stream}`)
          }
          subscriber.next(toLogMessage(msg))
        }
        subscriber.complete()
      }
      void pump().catch((err: unknown) => subscriber.error(err))

      return () => {
        closed = true
        unsubscribe()
      }
    })
  }

  async addStream(config: StreamConfig): Promise<void> {
    await this.streams.add(toNatsConfig(config))
  }

  async updateStream(config: StreamConfig): Promise<void> {
    await this.streams.update(config.name, toNatsConfig(config))
  }

  async deleteStream(name: string): Promise<void> {
    await this.streams.delete(name)
  }

  async streamInfo(name: string): Promise<StreamInfo> {
    const info = await this.streams.info(name)
    return {
      config: fromNatsConfig(info.config),
      messages: info.state.messages,
      lastSequence: info.state.last_seq,
    }
  }
}
