import { concat, defer, filter, from, Observable, Subject } from 'rxjs'
import {
  EventLog,
  EventLogError,
  LogMessage,
  PublishAck,
  PublishRequest,
  ReadOptions,
  StreamConfig,
  StreamInfo,
  WRONG_LAST_SEQUENCE,
} from './event-log'
import { isLiteralSubject, isValidPattern, subjectMatches } from './subject'

interface StreamState {
  config: StreamConfig
  messages: LogMessage[]
  ids: Map<string, number>
  appended: Subject<LogMessage>
}

function lastMatching(messages: LogMessage[], subject: string) {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (subjectMatches(subject, messages[i].subject)) return messages[i].sequence
  }
  return 0
}

/**
 * In-process log with JetStream semantics: per-stream sequences, de-duplication
 * by message id, per-subject sequence expectations and live ordered reads.
 * Nothing is persisted.
 */
export class MemoryEventLog implements EventLog {
  private readonly streams = new Map<string, StreamState>()

  async publish(
    stream: string,
    request: PublishRequest,
    signal?: AbortSignal,
  ): Promise<PublishAck> {
    signal?.throwIfAborted()
    const state = this.stream(stream)

    if (!isLiteralSubject(request.subject)) {
      throw new EventLogError(`invalid publish subject: ${request.subject}`)
    }
    if (!state.config.subjects.some((p) => subjectMatches(p, request.subject))) {
      throw new EventLogError(
        `subject ${request.subject} is not bound to stream ${stream}`,
      )
    }

    const seen = request.id ? state.ids.get(request.id) : undefined
    if (seen !== undefined) return { stream, sequence: seen, duplicate: true }

    if (request.expectedLastSubjectSequence !== undefined) {
      const last = lastMatching(state.messages, request.subject)
      if (last !== request.expectedLastSubjectSequence) {
        throw new EventLogError(
          `wrong last sequence: ${last}`,
          WRONG_LAST_SEQUENCE,
        )
      }
    }

    const message: LogMessage = {
      subject: request.subject,
      sequence: state.messages.length + 1,
      id: request.id || undefined,
      headers: { ...request.headers },
      data: Uint8Array.from(request.data),
    }
    state.messages.push(message)
    if (request.id) state.ids.set(request.id, message.sequence)
    state.appended.next(message)

    return { stream, sequence: message.sequence, duplicate: false }
  }

  async lastSequence(
    stream: string,
    subject: string,
    signal?: AbortSignal,
  ): Promise<number> {
    signal?.throwIfAborted()
    return lastMatching(this.stream(stream).messages, subject)
  }

  read(
    stream: string,
    subject: string,
    options: ReadOptions = {},
  ): Observable<LogMessage> {
    const start = options.startSequence ?? 1
    return defer(() => {
      const state = this.stream(stream)
      return concat(from([...state.messages]), state.appended)
    }).pipe(
      filter(
        (message) =>
          message.sequence >= start && subjectMatches(subject, message.subject),
      ),
    )
  }

  async addStream(config: StreamConfig): Promise<void> {
    if (this.streams.has(config.name)) {
      throw new EventLogError(`stream name already in use: ${config.name}`)
    }
    this.streams.set(config.name, {
      config: this.checked(config),
      messages: [],
      ids: new Map(),
      appended: new Subject(),
    })
  }

  async updateStream(config: StreamConfig): Promise<void> {
    this.stream(config.name).config = this.checked(config)
  }

  async deleteStream(name: string): Promise<void> {
    const state = this.stream(name)
    this.streams.delete(name)
    state.appended.complete()
  }

  async streamInfo(name: string): Promise<StreamInfo> {
    const state = this.stream(name)
    return {
      config: { ...state.config },
      messages: state.messages.length,
      lastSequence: state.messages.length,
    }
  }

  private stream(name: string): StreamState {
    const state = this.streams.get(name)
    if (!state) throw new EventLogError(`stream not found: ${name}`)
    return state
  }

  private checked(config: StreamConfig): StreamConfig {
    if (config.subjects.length === 0) {
      throw new EventLogError(`stream ${config.name} has no subjects`)
    }
    const invalid = config.subjects.find((s) => !isValidPattern(s))
    if (invalid !== undefined) {
      throw new EventLogError(`invalid stream subject: ${invalid}`)
    }
    return { ...config, subjects: [...config.subjects] }
  }
}
