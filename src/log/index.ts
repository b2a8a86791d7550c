export * from './event-log'
export * from './subject'
export * from './memory-event-log'
export * from './nats-event-log'
