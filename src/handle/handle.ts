/***
 * Handle: Packed generational reference into a SlotMap.
 *
 * A handle encodes a key-table offset (low `index_bits`) and the
 * generation ID that key carried when the handle was issued (the
 * `id_bits` above it). Both widths are chosen per map, so the packing
 * uses arithmetic rather than 32-bit bitwise operators: with
 * index_bits + id_bits <= 53 every handle is a safe integer.
 *
 * Layout: [id:id_bits][index:index_bits]
 *
 *   create_handle(index, id) → id * 2^index_bits + index
 *   get_index(handle)        → handle % 2^index_bits
 *   get_id(handle)           → floor(handle / 2^index_bits)
 *
 * ID 0 never belongs to a live key, so NULL_HANDLE (0) is always
 * invalid. Handles are plain numbers: copy them freely and compare
 * them with ===.
 *
 ***/

import { Brand, unsafe_cast, validate_and_cast } from "type_primitives";
import { SLOT_MAP_ERROR, SlotMapError } from "../utils/error";

export type SlotHandle = Brand<number, "slot_handle">;

export const NULL_HANDLE: SlotHandle = unsafe_cast<SlotHandle>(0);

export class HandleLayout {
  readonly index_max: number;
  readonly id_max: number;
  private readonly radix: number;

  /** Widths are validated by resolve_slot_map_options. */
  constructor(
    readonly index_bits: number,
    readonly id_bits: number,
  ) {
    this.radix = 2 ** index_bits;
    this.index_max = this.radix - 1;
    this.id_max = 2 ** id_bits - 1;
  }

  public create_handle(index: number, id: number): SlotHandle {
    if (__DEV__) {
      if (!Number.isInteger(index) || index < 0 || index > this.index_max) {
        throw new SlotMapError(SLOT_MAP_ERROR.HANDLE_FIELD_OVERFLOW, undefined, {
          field: "index",
          value: index,
          max: this.index_max,
        });
      }
      if (!Number.isInteger(id) || id < 0 || id > this.id_max) {
        throw new SlotMapError(SLOT_MAP_ERROR.HANDLE_FIELD_OVERFLOW, undefined, {
          field: "id",
          value: id,
          max: this.id_max,
        });
      }
    }
    return unsafe_cast<SlotHandle>(id * this.radix + index);
  }

  public get_index(handle: SlotHandle): number {
    return handle % this.radix;
  }

  public get_id(handle: SlotHandle): number {
    return Math.floor(handle / this.radix);
  }
}

export const is_null_handle = (handle: SlotHandle): boolean => handle === NULL_HANDLE;

/**
 * Brand a number read back from elsewhere (a typed array column, a
 * message) as a handle. Checks the shape under __DEV__, not validity:
 * ask the map with is_valid for that.
 */
export const as_slot_handle = (value: number): SlotHandle =>
  validate_and_cast<number, SlotHandle>(
    value,
    (v) => Number.isSafeInteger(v) && v >= 0,
    "SlotHandle must be a non-negative safe integer",
  );
