export interface ISnapshotCache<TKey, TValue> {
  add(key: TKey, value: TValue): void

  get(
    key: TKey,
    create: () => Promise<TValue | undefined>,
  ): Promise<TValue | undefined>

  remove(key: TKey): void

  clear(): void
}
