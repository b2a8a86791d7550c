export * from './snapshot-cache.interface'
export * from './lru.cache'
