export type Type<T = unknown> = new (...args: never[]) => T
