import AgeCache from "./agecache.js";
import type { CacheStats, Logger } from "./types.js";

export type ExerciseOptions = {
  capacity?: number;
  keySpace?: number;
  lookupFactor?: number;
  random?: () => number;
  logger?: Logger;
};

export type ExerciseReport = {
  stats: CacheStats;
  lastValue: number | undefined;
};

/**
 * Fills a cache with random pairs, then looks up random keys drawn from
 * the same key space `capacity * lookupFactor` times.
 */
export function exercise(options: ExerciseOptions = {}): ExerciseReport {
  const {
    capacity = 10_000,
    keySpace = 1_000_000,
    lookupFactor = 100,
    random = Math.random,
    logger = console,
  } = options;

  const draw = () => Math.floor(random() * keySpace);
  const cache = new AgeCache<number, number>(capacity, { logger });

  for (let i = 0; i < cache.getCapacity(); i++) {
    cache.insert(draw(), draw());
  }

  let lastValue: number | undefined;
  const lookups = cache.getCapacity() * lookupFactor;

  for (let i = 0; i < lookups; i++) {
    const value = cache.lookup(draw());
    if (value !== undefined) lastValue = value;
  }

  const stats = cache.getStats();

  logger.log(
    `%c[agecache]: %chits: ${stats.hits} / misses: ${stats.misses}`,
    "color: lightgreen; font-weight: bold;",
    "font-style:italic;color:lightgrey"
  );

  return { stats, lastValue };
}
