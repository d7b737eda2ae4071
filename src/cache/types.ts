/**
 * Copies values in and out of the cache.
 *
 * Usage
 *
 * ```ts
 * const cache = new AgeCache<string, Person, Uint8Array>(100, {
 *   codec: msgpackCodec(isPerson),
 * });
 * ```
 */
export interface Codec<V, Wire> {
  encode(value: V): Wire;
  decode(wire: Wire): V;
}

export type Logger = Pick<Console, "log" | "warn">;

export type CacheOptions<V, Wire> = {
  /**
   * Optional value codec
   * when set, values are stored encoded and every read decodes a fresh copy
   */
  codec?: Codec<V, Wire>;
  /**
   * Width of the age counter in bits (1..53)
   * The cache is purged whenever the counter wraps
   */
  ageBits?: number;
  /**
   * Diagnostics sink, `console` by default
   */
  logger?: Logger;
};

export type CacheStats = {
  hits: number;
  misses: number;
};

export type EvictedEntry<K, V> = {
  key: K;
  value: V;
};

export type EventName = "EVICT" | "PURGE" | "CLEAR";
