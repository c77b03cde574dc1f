/***
 * Brand: Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime.
 *
 * SlotHandle is a plain number at runtime (packed index and generation),
 * but Brand<number, "slot_handle"> keeps positions, key offsets and
 * arbitrary counts from being passed where a handle is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
