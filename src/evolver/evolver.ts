import { Event, StoredEvent } from '../event'

/** Caller-owned state advanced one event at a time, in log order. */
export interface Evolver {
  evolve(event: StoredEvent): void | Promise<void>
}

export interface Command<T = unknown> {
  id?: string
  type?: string
  time?: Date
  data: T
}

/** Turns a command into new events, given the state evolved so far. */
export interface Decider<TCommand = Command> extends Evolver {
  decide(command: TCommand): Event[] | Promise<Event[]>
}
