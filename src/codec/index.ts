export * from './codec'
export * from './json.codec'
export * from './msgpack.codec'
export * from './binary.codec'
