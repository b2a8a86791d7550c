import 'reflect-metadata'
import { Column, Entity, PrimaryColumn, VersionColumn } from 'typeorm'

const SequenceTransformer = {
  from(value: string) {
    return Number(value)
  },
  to(value: number) {
    return value.toString()
  },
}

const Base64Transformer = {
  from(value: string) {
    return new Uint8Array(Buffer.from(value, 'base64'))
  },
  to(value: Uint8Array) {
    return Buffer.from(value).toString('base64')
  },
}

@Entity({ name: 'event_store_snapshot' })
export class SnapshotRecord {
  @PrimaryColumn()
  id!: string

  @Column()
  type!: string

  /** Subject or wildcard pattern the state was evolved from. */
  @Column()
  subject!: string

  @Column({ type: 'text', transformer: SequenceTransformer })
  sequence!: number

  @Column({ type: 'text', transformer: Base64Transformer })
  data!: Uint8Array

  @VersionColumn()
  revision!: number

  @Column({ name: 'last_update_utc' })
  lastUpdateUtc!: Date
}
