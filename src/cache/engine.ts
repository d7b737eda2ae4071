import type { CacheStats } from "./types.js";

type Slot<V> = {
  value: V;
  age: number;
};

export type EngineHooks<K, V> = {
  onEvict?: (key: K, value: V) => void;
  onPurge?: (count: number) => void;
};

/**
 * LRU engine over two indexes:
 * - forward: key -> (value, age)
 * - reverse: age -> key, kept in ascending age order
 *
 * Ages only ever grow between purges, so appending to the reverse `Map`
 * keeps its insertion order equal to age order and its first entry is
 * always the least recently used one.
 */
export class Engine<K, V> {
  private forward = new Map<K, Slot<V>>();
  private reverse = new Map<number, K>();
  private lastAge = 0;
  private hits = 0;
  private misses = 0;

  constructor(
    private capacity: number,
    private readonly maxAge: number = Number.MAX_SAFE_INTEGER,
    private readonly hooks: EngineHooks<K, V> = {}
  ) {}

  /**
   * Retrieves the value and marks the key as most recently used.
   * Counts a hit or a miss.
   */
  lookup(key: K): V | undefined {
    const slot = this.forward.get(key);
    if (slot === undefined) {
      this.misses++;
      return undefined;
    }

    const age = this.advance();

    // after a purge the slot is re-added as the only entry
    this.reverse.delete(slot.age);
    this.reverse.set(age, key);
    slot.age = age;
    this.forward.set(key, slot);

    this.hits++;
    return slot.value;
  }

  insert(key: K, value: V): void {
    const age = this.advance();
    const slot = this.forward.get(key);

    if (slot === undefined) {
      this.forward.set(key, { value, age });
    } else {
      this.reverse.delete(slot.age);
      slot.value = value;
      slot.age = age;
    }
    this.reverse.set(age, key);

    this.trim();
  }

  /**
   * Empties both indexes and restarts the age counter.
   * Hit/miss statistics are kept.
   */
  clear(): number {
    const count = this.forward.size;
    this.forward.clear();
    this.reverse.clear();
    this.lastAge = 0;
    return count;
  }

  delete(key: K): boolean {
    const slot = this.forward.get(key);
    if (slot === undefined) return false;

    this.forward.delete(key);
    this.reverse.delete(slot.age);
    return true;
  }

  /** Value without touching recency or statistics. */
  peek(key: K): V | undefined {
    return this.forward.get(key)?.value;
  }

  has(key: K): boolean {
    return this.forward.has(key);
  }

  setCapacity(capacity: number): void {
    this.capacity = capacity;
    this.trim();
  }

  getCapacity(): number {
    return this.capacity;
  }

  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses };
  }

  get size(): number {
    return this.forward.size;
  }

  /**
   * Live entries from least to most recently used, as of the call.
   * Lookups and inserts made while iterating do not show up.
   */
  *entries(): IterableIterator<[K, V]> {
    const snapshot: [K, V][] = [];
    for (const key of this.reverse.values()) {
      const slot = this.forward.get(key);
      if (slot !== undefined) snapshot.push([key, slot.value]);
    }
    yield* snapshot;
  }

  /**
   * Throws on the first broken index invariant.
   */
  verify(): void {
    if (this.forward.size !== this.reverse.size) {
      throw new Error(
        `[agecache]: index sizes differ (${this.forward.size} keys, ${this.reverse.size} ages)`
      );
    }

    if (this.forward.size > this.capacity) {
      throw new Error(
        `[agecache]: ${this.forward.size} entries exceed capacity ${this.capacity}`
      );
    }

    let previous = -1;
    for (const [age, key] of this.reverse) {
      if (age <= previous) {
        throw new Error(`[agecache]: age ${age} is out of order`);
      }
      if (this.forward.get(key)?.age !== age) {
        throw new Error(`[agecache]: age ${age} does not match its key`);
      }
      previous = age;
    }
  }

  // #region Internal

  /**
   * Next age. A wrap past `maxAge` purges both indexes, since the
   * reverse order would no longer match recency.
   */
  private advance(): number {
    const next = this.lastAge >= this.maxAge ? 0 : this.lastAge + 1;

    if (next < this.lastAge) {
      const count = this.forward.size;
      this.forward.clear();
      this.reverse.clear();
      this.hooks.onPurge?.(count);
    }

    this.lastAge = next;
    return next;
  }

  // evict LRU while over capacity, hooks run once the indexes are settled
  private trim(): void {
    const evicted: [K, V][] = [];

    while (this.forward.size > this.capacity) {
      const oldest = this.reverse.entries().next();
      if (oldest.done) break;

      const [age, key] = oldest.value;
      this.reverse.delete(age);

      const slot = this.forward.get(key);
      this.forward.delete(key);
      if (slot !== undefined) evicted.push([key, slot.value]);
    }

    const onEvict = this.hooks.onEvict;
    if (onEvict === undefined) return;
    for (const [key, value] of evicted) onEvict(key, value);
  }

  //#endregion
}
