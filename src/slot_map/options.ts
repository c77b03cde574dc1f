/***
 * SlotMap options: construction-time configuration.
 *
 * Every setting is fixed for the lifetime of a map. Omitted fields
 * take the defaults from utils/constants. Resolution validates the
 * whole set at once and throws INVALID_OPTIONS with every offending
 * field in the error context.
 *
 ***/

import {
  is_integer_in_range,
  is_non_negative_integer,
  is_positive_integer,
} from "type_primitives";
import { GENERATION_POLICY } from "../key_table/key_table";
import { SLOT_MAP_ERROR, SlotMapError } from "../utils/error";
import {
  DEFAULT_ALLOCATION_SIZE,
  DEFAULT_ID_BITS,
  DEFAULT_INDEX_BITS,
  DEFAULT_MIN_FREE_KEYS,
  MAX_FIELD_BITS,
  MAX_HANDLE_BITS,
} from "../utils/constants";

export interface SlotMapOptions<T> {
  /** Width of the key-offset field in a handle. Caps the key table at 2^index_bits keys. */
  index_bits?: number;
  /** Width of the generation field in a handle. */
  id_bits?: number;
  /** The key table grows once this few keys are left free. */
  min_free_keys?: number;
  /** Chunk size for key table and item store (re)allocation. */
  allocation_size?: number;
  generation_policy?: GENERATION_POLICY;
  /** Called with each item the map lets go of: remove, clear and dispose. */
  on_release?: (item: T) => void;
}

export interface ResolvedSlotMapOptions<T> {
  readonly index_bits: number;
  readonly id_bits: number;
  readonly min_free_keys: number;
  readonly allocation_size: number;
  readonly generation_policy: GENERATION_POLICY;
  readonly on_release: ((item: T) => void) | undefined;
}

const GENERATION_POLICIES: readonly string[] = Object.values(GENERATION_POLICY);

export function resolve_slot_map_options<T>(
  options?: SlotMapOptions<T>,
): ResolvedSlotMapOptions<T> {
  const resolved: ResolvedSlotMapOptions<T> = {
    index_bits: options?.index_bits ?? DEFAULT_INDEX_BITS,
    id_bits: options?.id_bits ?? DEFAULT_ID_BITS,
    min_free_keys: options?.min_free_keys ?? DEFAULT_MIN_FREE_KEYS,
    allocation_size: options?.allocation_size ?? DEFAULT_ALLOCATION_SIZE,
    generation_policy: options?.generation_policy ?? GENERATION_POLICY.THROW,
    on_release: options?.on_release,
  };

  const problems: Record<string, unknown> = {};

  if (!is_integer_in_range(resolved.index_bits, 1, MAX_FIELD_BITS)) {
    problems.index_bits = resolved.index_bits;
  }
  if (!is_integer_in_range(resolved.id_bits, 1, MAX_FIELD_BITS)) {
    problems.id_bits = resolved.id_bits;
  }
  if (resolved.index_bits + resolved.id_bits > MAX_HANDLE_BITS) {
    problems.handle_bits = resolved.index_bits + resolved.id_bits;
  }
  if (!is_non_negative_integer(resolved.min_free_keys)) {
    problems.min_free_keys = resolved.min_free_keys;
  }
  if (!is_positive_integer(resolved.allocation_size)) {
    problems.allocation_size = resolved.allocation_size;
  }
  if (!GENERATION_POLICIES.includes(resolved.generation_policy)) {
    problems.generation_policy = resolved.generation_policy;
  }
  // A single generation (id_bits = 1) would wrap onto itself and
  // never invalidate anything.
  if (resolved.generation_policy === GENERATION_POLICY.WRAP && resolved.id_bits < 2) {
    problems.generation_policy = resolved.generation_policy;
  }
  if (resolved.on_release !== undefined && typeof resolved.on_release !== "function") {
    problems.on_release = typeof resolved.on_release;
  }

  if (Object.keys(problems).length > 0) {
    throw new SlotMapError(
      SLOT_MAP_ERROR.INVALID_OPTIONS,
      `invalid slot map options: ${Object.keys(problems).join(", ")}`,
      problems,
    );
  }

  return Object.freeze(resolved);
}
