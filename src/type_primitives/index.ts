export type { Brand } from "./brand";
export {
  is_integer_in_range,
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { PrimitiveTypeError, TYPE_ERROR } from "./error";
export {
  TYPED_ARRAY_MAP,
  is_typed_array_tag,
  type AnyTypedArray,
  type TypedArrayConstructor,
  type TypedArrayTag,
} from "./typed_arrays/typed_arrays";
