/***
 * Typed array tags: numeric item types for typed slot storage.
 *
 * A TypedArrayTag names one fixed-width numeric element type. The tag
 * selects the backing TypedArray constructor, so a slot map of numbers
 * can keep its items in a single contiguous buffer and relocate them
 * with one block copy.
 *
 ***/

export type TypedArrayTag =
  | "f32"
  | "f64"
  | "i8"
  | "i16"
  | "i32"
  | "u8"
  | "u16"
  | "u32";

export type AnyTypedArray =
  | Float32Array
  | Float64Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array;

export type TypedArrayConstructor = new (length: number) => AnyTypedArray;

export const TYPED_ARRAY_MAP = {
  f32: Float32Array,
  f64: Float64Array,
  i8: Int8Array,
  i16: Int16Array,
  i32: Int32Array,
  u8: Uint8Array,
  u16: Uint16Array,
  u32: Uint32Array,
} as const satisfies Record<TypedArrayTag, TypedArrayConstructor>;

export const is_typed_array_tag = (value: string): value is TypedArrayTag =>
  Object.prototype.hasOwnProperty.call(TYPED_ARRAY_MAP, value);
