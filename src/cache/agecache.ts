import { Engine } from "./engine.js";

import type {
  CacheOptions,
  CacheStats,
  EventName,
  EvictedEntry,
  Logger,
} from "./types.js";

type CacheEvents<K, V> = {
  EVICT: EvictedEntry<K, V>;
  PURGE: number;
  CLEAR: number;
};

// stored form of a value, yields a copy on every read when a codec is set
type Read<V> = () => V;

const MAX_AGE_BITS = 53;

function assertCapacity(capacity: number): void {
  if (!Number.isSafeInteger(capacity) || capacity < 0) {
    throw new Error(
      `[agecache]: capacity must be a non-negative integer, got ${capacity}`
    );
  }
}

export default class AgeCache<K, V, Wire = V> {
  private engine: Engine<K, Read<V>>;
  private events: EventTarget;
  private logger: Logger;
  // decoding an evicted value is skipped while nobody listens
  private evictListeners = 0;
  private store: (value: V) => Read<V>;

  constructor(capacity: number = 3, options: CacheOptions<V, Wire> = {}) {
    assertCapacity(capacity);

    const ageBits = options.ageBits ?? MAX_AGE_BITS;
    if (!Number.isInteger(ageBits) || ageBits < 1 || ageBits > MAX_AGE_BITS) {
      throw new Error(
        `[agecache]: ageBits must be an integer in 1..${MAX_AGE_BITS}, got ${ageBits}`
      );
    }

    this.events = new EventTarget();
    this.logger = options.logger ?? console;

    const codec = options.codec;
    this.store =
      codec === undefined
        ? (value) => () => value
        : (value) => {
            const wire = codec.encode(value);
            return () => codec.decode(wire);
          };

    this.engine = new Engine<K, Read<V>>(capacity, 2 ** ageBits - 1, {
      onEvict: (key, read) => {
        if (this.evictListeners > 0) this.emit("EVICT", { key, value: read() });
      },
      onPurge: (count) => {
        this.logger.warn(
          "%c[agecache]: %cage counter wrapped, purged %d entries",
          "color: orange; font-weight: bold;",
          "font-style:italic;color:lightgrey",
          count
        );
        this.emit("PURGE", count);
      },
    });
  }

  /**
   * fetch a value, refreshing its recency
   *
   * counts a hit or a miss, `undefined` on a miss
   */
  lookup(key: K): V | undefined {
    const read = this.engine.lookup(key);
    return read === undefined ? undefined : read();
  }

  /**
   * put a value into the cache as the most recently used entry
   *
   * evicts the oldest entries beyond capacity
   */
  insert(key: K, value: V): void {
    this.engine.insert(key, this.store(value));
  }

  /**
   * drop every entry, statistics are kept
   */
  clear(): void {
    const count = this.engine.clear();
    this.emit("CLEAR", count);
  }

  setCapacity(capacity: number): void {
    assertCapacity(capacity);
    this.engine.setCapacity(capacity);
  }

  getCapacity(): number {
    return this.engine.getCapacity();
  }

  getStats(): CacheStats {
    return this.engine.getStats();
  }

  delete(key: K): boolean {
    return this.engine.delete(key);
  }

  /**
   * read without refreshing recency or counting a hit/miss
   */
  peek(key: K): V | undefined {
    const read = this.engine.peek(key);
    return read === undefined ? undefined : read();
  }

  has(key: K): boolean {
    return this.engine.has(key);
  }

  get size(): number {
    return this.engine.size;
  }

  /**
   * keys from least to most recently used
   */
  *keys(): IterableIterator<K> {
    for (const [key] of this.engine.entries()) yield key;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, read] of this.engine.entries()) yield [key, read()];
  }

  /**
   * check index consistency, throws on the first broken invariant
   */
  verify(): void {
    this.engine.verify();
  }

  private emit<E extends EventName>(
    event: E,
    data: CacheEvents<K, V>[E]
  ): void {
    this.events.dispatchEvent(new CustomEvent(event, { detail: data }));
  }

  /**
   * Subscribe to cache events.
   *
   * @param event - `EVICT` | `PURGE` | `CLEAR`
   *
   * @param listener - Callback invoked with event payload:
   * - `EVICT` → `{ key, value }` of an entry trimmed for capacity
   * - `PURGE` → number of entries dropped when the age counter wrapped
   * - `CLEAR` → number of entries dropped by `clear()`
   *
   * @returns Cleanup function to unsubscribe.
   */
  subscribe<E extends EventName>(
    event: E,
    listener: (data: CacheEvents<K, V>[E]) => void
  ): () => void {
    const wrapped: EventListener = (e) => {
      if (e instanceof CustomEvent) listener(e.detail);
    };

    this.events.addEventListener(event, wrapped);
    if (event === "EVICT") this.evictListeners++;

    let subscribed = true;
    return () => {
      if (!subscribed) return;
      subscribed = false;
      this.events.removeEventListener(event, wrapped);
      if (event === "EVICT") this.evictListeners--;
    };
  }
}
