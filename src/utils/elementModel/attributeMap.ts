// Immutable attribute storage

/**
 * Read-only ordered map. Unlike a frozen Map, entries cannot be changed
 * through a cast: there is no set or delete to reach.
 */
export class AttributeMap implements ReadonlyMap<string, string> {
  private readonly store: Map<string, string>

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.store = new Map(entries)
    Object.freeze(this)
  }

  get size(): number {
    return this.store.size
  }

  get(key: string): string | undefined {
    return this.store.get(key)
  }

  has(key: string): boolean {
    return this.store.has(key)
  }

  entries() {
    return this.store.entries()
  }

  keys() {
    return this.store.keys()
  }

  values() {
    return this.store.values()
  }

  [Symbol.iterator]() {
    return this.store[Symbol.iterator]()
  }

  forEach(
    callbackfn: (value: string, key: string, map: ReadonlyMap<string, string>) => void,
    thisArg?: unknown
  ): void {
    this.store.forEach((value, key) => callbackfn.call(thisArg, value, key, this))
  }
}
