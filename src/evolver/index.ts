export * from './evolver'
export * from './event-map'
export * from './event-map-builder'
