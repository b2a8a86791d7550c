import { EventStoreConfig, EventStoreOptions, ResolvedOptions, resolveOptions } from '../config'
import { EventLog } from '../log/event-log'
import { TypeRegistry } from '../registry/type-registry'
import { EventStore } from './event-store'

/**
 * Entry point: binds an {@link EventLog} to one set of options and hands out
 * store handles. Handles are cheap and share the log.
 */
export class EventStoreClient {
  private readonly options: ResolvedOptions

  constructor(
    private readonly log: EventLog,
    options: Partial<EventStoreOptions> = {},
  ) {
    this.options = resolveOptions(options)
  }

  get types(): TypeRegistry | undefined {
    return this.options.types
  }

  get(name: string): EventStore {
    return new EventStore(name, this.log, this.options)
  }

  async create(config: EventStoreConfig): Promise<EventStore> {
    const { name, ...rest } = config
    const store = this.get(name)
    await store.create(rest)
    return store
  }

  async update(config: EventStoreConfig): Promise<void> {
    const { name, ...rest } = config
    await this.get(name).update(rest)
  }

  async delete(name: string): Promise<void> {
    await this.get(name).delete()
  }
}
