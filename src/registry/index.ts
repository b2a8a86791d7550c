export * from './type-registry'
