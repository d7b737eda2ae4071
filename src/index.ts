export { default as AgeCache } from "./cache/agecache.js";
export { Engine } from "./cache/engine.js";
export { msgpackCodec } from "./cache/codec.js";
export { exercise } from "./cache/exercise.js";

export type { EngineHooks } from "./cache/engine.js";
export type { ExerciseOptions, ExerciseReport } from "./cache/exercise.js";
export type {
  CacheOptions,
  CacheStats,
  Codec,
  EventName,
  EvictedEntry,
  Logger,
} from "./cache/types.js";
