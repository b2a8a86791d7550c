export * from './errors'
export * from './event'
export * from './type'
export * from './clock'
export * from './id'
export * from './logger'
export * from './config'
export * from './codec'
export * from './registry'
export * from './log'
export * from './evolver'
export * from './store'
export * from './cache'
export * from './snapshot'
