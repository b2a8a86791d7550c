import { Repository } from 'typeorm'
import { ISnapshotCache } from '../cache/snapshot-cache.interface'
import { Clock, systemClock } from '../clock'
import { TypeRegistry } from '../registry/type-registry'
import { Type } from '../type'
import { SnapshotRecord } from './snapshot-record.entity'

export interface Snapshot<T = object> {
  id: string
  type: string
  subject: string
  /** Sequence of the last event folded into `data`. */
  sequence: number
  revision: number
  data: T
  updatedAt: Date
}

export interface SnapshotInput<T = object> {
  subject: string
  sequence: number
  data: T
}

export interface SnapshotStoreOptions {
  /** Records are read from the repository every time without one. */
  cache: ISnapshotCache<string, SnapshotRecord>
  clock: Clock
}

/**
 * Persists evolved state so a replay can resume with `afterSequence` instead
 * of starting from the first event. State is encoded through the registry,
 * so its class must be registered.
 */
export class TypeOrmSnapshotStore {
  private readonly cache?: ISnapshotCache<string, SnapshotRecord>
  private readonly clock: Clock

  constructor(
    private readonly repository: Repository<SnapshotRecord>,
    private readonly types: TypeRegistry,
    options: Partial<SnapshotStoreOptions> = {},
  ) {
    this.cache = options.cache
    this.clock = options.clock ?? systemClock
  }

  async load(id: string): Promise<Snapshot | undefined> {
    const record = await this.find(id)
    if (!record) return
    return this.toSnapshot(
      record,
      this.types.unmarshalType(record.data, record.type),
    )
  }

  async loadAs<T extends object>(
    id: string,
    Class: Type<T>,
  ): Promise<Snapshot<T> | undefined> {
    const snapshot = await this.load(id)
    if (!snapshot) return
    const { data } = snapshot
    if (!(data instanceof Class)) {
      throw new TypeError(`snapshot ${id} holds ${snapshot.type}, not ${Class.name}`)
    }
    return { ...snapshot, data }
  }

  async save<T extends object>(
    id: string,
    input: SnapshotInput<T>,
  ): Promise<Snapshot<T>> {
    const existing = await this.find(id)
    // Never mutate `existing`: it may be the cached instance.
    const record = this.repository.create({
      ...existing,
      id,
      type: this.types.lookup(input.data),
      subject: input.subject,
      sequence: input.sequence,
      data: this.types.marshal(input.data),
      lastUpdateUtc: this.clock.now(),
    })

    let saved: SnapshotRecord
    try {
      saved = await this.repository.save(record)
    } catch (err) {
      this.cache?.remove(id)
      throw err
    }
    this.cache?.add(id, saved)
    return this.toSnapshot(saved, input.data)
  }

  async remove(id: string): Promise<boolean> {
    const result = await this.repository.delete({ id })
    this.cache?.remove(id)
    return (result.affected ?? 0) > 0
  }

  private find(id: string): Promise<SnapshotRecord | undefined> {
    const read = async () =>
      (await this.repository.findOneBy({ id })) ?? undefined
    return this.cache ? this.cache.get(id, read) : read()
  }

  private toSnapshot<T>(record: SnapshotRecord, data: T): Snapshot<T> {
    return {
      id: record.id,
      type: record.type,
      subject: record.subject,
      sequence: record.sequence,
      revision: record.revision,
      data,
      updatedAt: record.lastUpdateUtc,
    }
  }
}
