export * from './snapshot-record.entity'
export * from './snapshot-store'
