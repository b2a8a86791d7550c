import {
  lastValueFrom,
  map,
  Observable,
  race,
  takeWhile,
  toArray,
} from 'rxjs'
import { EventStoreConfig, ResolvedOptions, streamConfig } from '../config'
import {
  CodecNotRegisteredError,
  EventDataRequiredError,
  EventIdRequiredError,
  EventStoreError,
  EventTypeMismatchError,
  EventTypeRequiredError,
  EvolveError,
  SequenceConflictError,
} from '../errors'
import { Event, isValidator, StoredEvent } from '../event'
import { Decider, Evolver } from '../evolver/evolver'
import {
  EventLog,
  isWrongLastSequence,
  LogMessage,
  PublishRequest,
  StreamInfo,
} from '../log/event-log'
import { Logger } from '../logger'
import {
  checkMetadata,
  envelopeHeaders,
  PayloadCodec,
  payloadCodec,
  readEnvelope,
} from './envelope'

export interface AppendOptions {
  /**
   * Last sequence the caller saw for the subject, 0 for none. Only the first
   * event of a batch carries it.
   */
  expectedSequence?: number
  signal?: AbortSignal
}

export interface LoadOptions {
  /** Only events after this sequence are returned. */
  afterSequence?: number
  signal?: AbortSignal
}

export interface LoadResult {
  events: StoredEvent[]
  /** Last sequence for the subject when the load started; 0 when empty. */
  sequence: number
}

export interface DecideResult {
  events: Event[]
  sequence: number
}

type WrappedEvent = Event & Pick<StoredEvent, 'id' | 'type' | 'time'>

function aborted(signal: AbortSignal): Observable<never> {
  return new Observable<never>((subscriber) => {
    const onAbort = () => subscriber.error(signal.reason)
    if (signal.aborted) return onAbort()
    signal.addEventListener('abort', onAbort, { once: true })
    return () => signal.removeEventListener('abort', onAbort)
  })
}

/**
 * Event store over one stream of an {@link EventLog}. The handle holds no
 * mutable state; sequencing and concurrency control are left to the log.
 */
export class EventStore {
  private readonly logger: Logger
  private readonly payloads: PayloadCodec

  constructor(
    public readonly name: string,
    private readonly log: EventLog,
    private readonly options: ResolvedOptions,
  ) {
    this.logger = options.logger.child({ stream: name })
    this.payloads = payloadCodec(options.types)
  }

  /**
   * Appends events to `subject` in order and returns the sequence of the
   * last one. The whole batch is validated before anything is published.
   */
  async append(
    subject: string,
    events: Event | Event[],
    options: AppendOptions = {},
  ): Promise<number> {
    const batch = Array.isArray(events) ? events : [events]
    if (batch.length === 0) return 0

    const wrapped: WrappedEvent[] = []
    for (const event of batch) {
      wrapped.push(await this.wrap(event))
    }
    const requests = wrapped.map((event) => this.pack(subject, event))

    const { expectedSequence, signal } = options
    let sequence = 0
    for (const [i, request] of requests.entries()) {
      if (i === 0 && expectedSequence !== undefined) {
        request.expectedLastSubjectSequence = expectedSequence
      }

      try {
        const ack = await this.log.publish(this.name, request, signal)
        sequence = ack.sequence
        if (ack.duplicate) {
          this.logger.debug({ subject, id: request.id, sequence }, 'duplicate event')
        }
      } catch (err) {
        if (i === 0 && expectedSequence !== undefined && isWrongLastSequence(err)) {
          this.logger.warn({ subject, expectedSequence }, 'sequence conflict')
          throw new SequenceConflictError(subject, expectedSequence, err)
        }
        throw err
      }

      batch[i].subject = subject
      batch[i].sequence = sequence
    }

    this.logger.debug({ subject, count: batch.length, sequence }, 'appended events')
    return sequence
  }

  async load(subject: string, options: LoadOptions = {}): Promise<LoadResult> {
    const { afterSequence, signal } = options

    const last = await this.log.lastSequence(this.name, subject, signal)
    if (last === 0) return { events: [], sequence: 0 }
    if (afterSequence !== undefined && afterSequence >= last) {
      return { events: [], sequence: last }
    }

    const read$ = this.log
      .read(this.name, subject, {
        startSequence:
          afterSequence === undefined ? undefined : afterSequence + 1,
      })
      .pipe(
        takeWhile((message) => message.sequence < last, true),
        map((message) => this.unpack(message)),
        toArray(),
      )
    const events = await lastValueFrom(
      signal ? race(read$, aborted(signal)) : read$,
    )

    const reached = events.length ? events[events.length - 1].sequence : 0
    if (reached !== last) {
      throw new EventStoreError(
        `read of ${subject} ended at sequence ${reached} before ${last}`,
      )
    }

    this.logger.debug({ subject, count: events.length, sequence: last }, 'loaded events')
    return { events, sequence: last }
  }

  /**
   * Folds the subject's events into `evolver` and returns the sequence
   * reached. A failing event raises {@link EvolveError} carrying the last
   * sequence applied before it.
   */
  async evolve(
    subject: string,
    evolver: Evolver,
    options: LoadOptions = {},
  ): Promise<number> {
    const { events, sequence } = await this.load(subject, options)

    let applied = options.afterSequence ?? 0
    for (const event of events) {
      try {
        await evolver.evolve(event)
      } catch (err) {
        this.logger.error(
          { subject, sequence: applied, failed: event.sequence, err },
          'evolve failed',
        )
        throw new EvolveError(applied, event, err)
      }
      applied = event.sequence
    }

    return sequence
  }

  /**
   * Rebuilds the decider from `subject`, asks it to decide on `command` and
   * appends the outcome on the condition that nothing was appended meanwhile.
   */
  async decide<TCommand>(
    subject: string,
    decider: Decider<TCommand>,
    command: TCommand,
    options: { signal?: AbortSignal } = {},
  ): Promise<DecideResult> {
    const { signal } = options
    const sequence = await this.evolve(subject, decider, { signal })
    const events = await decider.decide(command)
    if (events.length === 0) return { events, sequence }

    return {
      events,
      sequence: await this.append(subject, events, {
        expectedSequence: sequence,
        signal,
      }),
    }
  }

  async create(config: Omit<EventStoreConfig, 'name'> = {}): Promise<void> {
    await this.log.addStream(streamConfig({ ...config, name: this.name }))
  }

  async update(config: Omit<EventStoreConfig, 'name'> = {}): Promise<void> {
    await this.log.updateStream(streamConfig({ ...config, name: this.name }))
  }

  async delete(): Promise<void> {
    await this.log.deleteStream(this.name)
  }

  info(): Promise<StreamInfo> {
    return this.log.streamInfo(this.name)
  }

  private async wrap(event: Event): Promise<WrappedEvent> {
    const { types, id, clock } = this.options
    if (event.data === undefined || event.data === null) {
      throw new EventDataRequiredError()
    }

    let type = event.type
    if (types) {
      const registered = types.lookup(event.data)
      if (type && type !== registered) {
        throw new EventTypeMismatchError(type, registered)
      }
      type = registered
    } else if (!type) {
      throw new EventTypeRequiredError()
    }

    if (event.meta) checkMetadata(event.meta)

    if (isValidator(event.data)) {
      await event.data.validate()
    }

    const eventId = event.id || id.next()
    if (!eventId) throw new EventIdRequiredError()

    event.id = eventId
    event.type = type
    event.time = event.time ?? clock.now()
    return { ...event, id: eventId, type, time: event.time }
  }

  private pack(subject: string, event: WrappedEvent): PublishRequest {
    return {
      subject,
      id: event.id,
      data: this.payloads.marshal(event.data),
      headers: envelopeHeaders({
        type: event.type,
        time: event.time,
        codec: this.payloads.codec,
        meta: event.meta ?? {},
      }),
    }
  }

  private unpack(message: LogMessage): StoredEvent {
    const envelope = readEnvelope(message)
    if (envelope.codec !== undefined && envelope.codec !== this.payloads.codec) {
      throw new CodecNotRegisteredError(envelope.codec)
    }

    return {
      id: message.id ?? '',
      type: envelope.type,
      time: envelope.time,
      data: this.payloads.unmarshal(message.data, envelope.type),
      meta: envelope.meta,
      subject: message.subject,
      sequence: message.sequence,
    }
  }
}
