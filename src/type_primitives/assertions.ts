/***
 * Assertions: Runtime validation and branded casting.
 *
 * `validate_and_cast` only checks under __DEV__ and is tree-shaken
 * from production builds. The integer predicates are plain
 * functions so option validation can use them in every build.
 * unsafe_cast bypasses all checks (the caller guarantees validity).
 *
 ***/

import { TYPE_ERROR, PrimitiveTypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

/** Inclusive on both ends. */
export const is_integer_in_range = (v: number, min: number, max: number): boolean =>
  Number.isInteger(v) && v >= min && v <= max;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new PrimitiveTypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
