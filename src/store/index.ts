export * from './envelope'
export * from './event-store'
export * from './event-store-client'
