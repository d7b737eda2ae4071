import { decode, encode } from "@msgpack/msgpack";
import type { Codec } from "./types.js";

/**
 * MessagePack copy codec.
 *
 * `guard` checks every decoded value, so reads stay typed without trusting
 * the wire blindly.
 */
export function msgpackCodec<V>(
  guard: (data: unknown) => data is V
): Codec<V, Uint8Array> {
  return {
    encode: (value) => encode(value),
    decode: (wire) => {
      const data = decode(wire);
      if (!guard(data)) {
        throw new Error("[agecache]: decoded value failed the codec guard");
      }
      return data;
    },
  };
}
