import { StoredEvent } from '../event'
import { TypeRegistry } from '../registry/type-registry'
import { Type } from '../type'
import { EventHandler, EventMap, EventPredicate, IEventMap } from './event-map'
import { Evolver } from './evolver'

export interface IEventMapBuilder<TState> {
  build(state: TState): MappedEvolver<TState>
}

/**
 * Evolver over caller-owned state that routes each event to the handlers
 * mapped for its type. Events nobody mapped are skipped.
 */
export class MappedEvolver<TState> implements Evolver {
  constructor(
    private readonly map: IEventMap<TState>,
    public readonly state: TState,
  ) {}

  async evolve(event: StoredEvent): Promise<void> {
    await this.map.handle(event, this.state)
  }
}

/**
 * Type resolution settings (`usingRegistry`, `withEventTypeFromConstructor`)
 * apply to the mappings declared after them.
 */
export class EventMapBuilder<TState> implements IEventMapBuilder<TState> {
  private readonly eventMap = new EventMap<TState>()

  public where(filter: EventPredicate<TState>) {
    this.eventMap.addFilter(filter)
    return this
  }

  public withEventTypeFromEvent(fn: (event: StoredEvent) => string) {
    this.eventMap.withEventTypeFromEvent(fn)
    return this
  }

  public withEventTypeFromConstructor(fn: (constructor: Type<object>) => string) {
    this.eventMap.withEventTypeFromConstructor(fn)
    return this
  }

  /** Names payload classes by their registered type name. */
  public usingRegistry(registry: TypeRegistry) {
    return this.withEventTypeFromConstructor((constructor) =>
      registry.lookupType(constructor),
    )
  }

  public map<TData extends object>(...Events: Type<TData>[]) {
    return new Action<TData, TState>((handler) =>
      this.eventMap.add(Events, handler),
    )
  }

  public mapNamed(...names: string[]) {
    return new Action<unknown, TState>((handler) =>
      this.eventMap.addNamed(names, handler),
    )
  }

  public build(state: TState): MappedEvolver<TState> {
    return new MappedEvolver(this.eventMap, state)
  }
}

interface IAction<TData, TState> {
  as(handler: EventHandler<TState, TData>): void

  when(filter: EventPredicate<TState, TData>): IAction<TData, TState>
}

class Action<TData, TState> implements IAction<TData, TState> {
  private readonly predicates: EventPredicate<TState, TData>[] = []

  constructor(
    private readonly register: (handler: EventHandler<TState, TData>) => void,
  ) {}

  when(filter: EventPredicate<TState, TData>): IAction<TData, TState> {
    if (filter == null) {
      throw new Error(`filter is null`)
    }

    this.predicates.push(filter)

    return this
  }

  as(action: EventHandler<TState, TData>): void {
    this.register(async (event, state) => {
      for (const predicate of this.predicates) {
        if (!(await predicate(event, state))) return
      }

      await action(event, state)
    })
  }
}
