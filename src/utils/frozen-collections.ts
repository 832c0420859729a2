/**
 * Read-only Map and Set wrappers.
 *
 * A frozen `Map` still accepts `set()`, so the options record stores its keyed
 * tables and sets behind wrappers that expose no mutators at all. The backing
 * collection is copied on construction and never handed out.
 *
 * @packageDocumentation
 */

/**
 * Read-only map with enforced key and value types.
 *
 * @example
 * ```ts
 * const rollouts = FrozenMap.fromObject({ new_resolver: 'on' });
 * rollouts.get('new_resolver'); // 'on'
 * rollouts.get('other');        // undefined
 * ```
 *
 * @template K - The type of keys in the map.
 * @template V - The type of values in the map.
 */
export class FrozenMap<K, V> implements Iterable<[K, V]> {
  private readonly map: Map<K, V>;

  private constructor(map: Map<K, V>) {
    this.map = map;
    Object.freeze(this);
  }

  /**
   * Creates an empty FrozenMap.
   */
  static empty<K, V>(): FrozenMap<K, V> {
    return new FrozenMap(new Map<K, V>());
  }

  /**
   * Creates a FrozenMap from an iterable of entries. Later duplicates win.
   *
   * @param entries - An iterable of [key, value] tuples.
   */
  static fromEntries<K, V>(entries: Iterable<readonly [K, V]>): FrozenMap<K, V> {
    const map = new Map<K, V>();
    for (const [key, value] of entries) {
      map.set(key, value);
    }
    return new FrozenMap(map);
  }

  /**
   * Creates a FrozenMap from a plain object's own enumerable entries.
   *
   * @param obj - The plain object to convert.
   */
  static fromObject<V>(obj: Readonly<Record<string, V>>): FrozenMap<string, V> {
    return FrozenMap.fromEntries(Object.entries(obj));
  }

  /**
   * Returns the value associated with the key, or undefined if not found.
   */
  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  get size(): number {
    return this.map.size;
  }

  keys(): IterableIterator<K> {
    return this.map.keys();
  }

  values(): IterableIterator<V> {
    return this.map.values();
  }

  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  /**
   * Returns a mutable copy of the underlying entries.
   */
  toMap(): Map<K, V> {
    return new Map(this.map);
  }
}

/**
 * Read-only set.
 *
 * @template T - The type of members.
 */
export class FrozenSet<T> implements Iterable<T> {
  private readonly set: Set<T>;

  private constructor(set: Set<T>) {
    this.set = set;
    Object.freeze(this);
  }

  static empty<T>(): FrozenSet<T> {
    return new FrozenSet(new Set<T>());
  }

  static from<T>(values: Iterable<T>): FrozenSet<T> {
    return new FrozenSet(new Set(values));
  }

  has(value: T): boolean {
    return this.set.has(value);
  }

  get size(): number {
    return this.set.size;
  }

  values(): IterableIterator<T> {
    return this.set.values();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.set.values();
  }
}
