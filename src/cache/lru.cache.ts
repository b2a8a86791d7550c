import QuickLRU from 'quick-lru'
import { ISnapshotCache } from './snapshot-cache.interface'

interface LruOptions {
  capacity: number
  /** Milliseconds an entry stays usable. */
  retention?: number
}

interface Entry<TValue> {
  value: TValue
  expiry: number
}

export class LruCache<TKey, TValue> implements ISnapshotCache<TKey, TValue> {
  private readonly cache: QuickLRU<TKey, Entry<TValue>>
  private readonly retention: number

  constructor(options: LruOptions) {
    if (options.retention !== undefined && options.retention <= 0) {
      throw new TypeError('`retention` must be a number greater than 0')
    }
    this.cache = new QuickLRU<TKey, Entry<TValue>>({ maxSize: options.capacity })
    this.retention = options.retention ?? Number.POSITIVE_INFINITY
  }

  add(key: TKey, value: TValue): void {
    this.cache.set(key, { value, expiry: Date.now() + this.retention })
  }

  clear(): void {
    this.cache.clear()
  }

  async get(
    key: TKey,
    create: () => Promise<TValue | undefined>,
  ): Promise<TValue | undefined> {
    const cached = this.cache.get(key)
    if (cached && cached.expiry > Date.now()) return cached.value
    const value = await create()
    if (value == null) {
      this.cache.delete(key)
      return
    }
    this.add(key, value)
    return value
  }

  remove(key: TKey): void {
    this.cache.delete(key)
  }
}
