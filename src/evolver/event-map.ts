import { StoredEvent } from '../event'
import { Type } from '../type'

export interface IEventMap<TState> {
  handle(event: StoredEvent, state: TState): Promise<boolean>
}

export type EventFunc<TState, TReturn = void, TData = unknown> = (
  event: StoredEvent<TData>,
  state: TState,
) => TReturn | Promise<TReturn>
export type EventHandler<TState, TData = unknown> = EventFunc<
  TState,
  void,
  TData
>
export type EventPredicate<TState, TData = unknown> = EventFunc<
  TState,
  boolean,
  TData
>

export class EventMap<TState> implements IEventMap<TState> {
  private readonly mappings = new Map<string, EventHandler<TState>[]>()
  private readonly filters: EventPredicate<TState>[] = []
  private eventTypeFromConstructor = (constructor: Type<object>) =>
    constructor.name
  private eventTypeFromEvent = (event: StoredEvent) => event.type

  add<TData extends object>(
    Event: Type<TData> | Type<TData>[],
    action: EventHandler<TState, TData>,
  ) {
    const types = Array.isArray(Event) ? Event : [Event]
    for (const type of types) {
      this.push(this.eventTypeFromConstructor(type), (event, state) => {
        const { data } = event
        if (!(data instanceof type)) {
          throw new TypeError(
            `${event.type} payload is not an instance of ${type.name}`,
          )
        }
        return action({ ...event, data }, state)
      })
    }
  }

  addNamed(names: string | string[], action: EventHandler<TState>) {
    for (const name of Array.isArray(names) ? names : [names]) {
      this.push(name, action)
    }
  }

  withEventTypeFromEvent(fn: (event: StoredEvent) => string) {
    this.eventTypeFromEvent = fn
  }

  withEventTypeFromConstructor(fn: (constructor: Type<object>) => string) {
    this.eventTypeFromConstructor = fn
  }

  addFilter(filter: EventPredicate<TState>) {
    this.filters.push(filter)
  }

  public async handle(event: StoredEvent, state: TState) {
    if (!(await this.passesFilter(event, state))) return false

    const handlers = this.mappings.get(this.eventTypeFromEvent(event)) ?? []
    for (const handler of handlers) {
      await handler(event, state)
    }
    return handlers.length > 0
  }

  private push(eventType: string, handler: EventHandler<TState>) {
    const handlers = this.mappings.get(eventType) ?? []
    handlers.push(handler)
    this.mappings.set(eventType, handlers)
  }

  private async passesFilter(event: StoredEvent, state: TState) {
    if (!this.filters.length) return true
    const results = await Promise.all(
      this.filters.map((filter) => filter(event, state)),
    )
    return results.every(Boolean)
  }
}
