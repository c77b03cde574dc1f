import type { AnyTypedArray } from "type_primitives";

/**
 * Smallest multiple of `chunk` that is >= `count`. Zero stays zero.
 */
export function round_up_to_chunk(count: number, chunk: number): number {
  return Math.ceil(count / chunk) * chunk;
}

/**
 * Smallest multiple of `chunk` that is strictly greater than `count`.
 */
export function next_chunk_above(count: number, chunk: number): number {
  return (Math.floor(count / chunk) + 1) * chunk;
}

/**
 * Block-copy the first `live` elements of `src` into a freshly
 * allocated `next` and return it. Slots past `live` keep whatever
 * `next` was created with (zeroes).
 */
export function transfer_live<T extends AnyTypedArray>(
  next: T,
  src: AnyTypedArray,
  live: number,
): T {
  next.set(src.subarray(0, Math.min(live, next.length)));
  return next;
}
