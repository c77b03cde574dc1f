import { describe, expect, it } from "vitest";
import { resolve_slot_map_options } from "../options";
import { GENERATION_POLICY } from "../../key_table/key_table";
import { SLOT_MAP_ERROR, SlotMapError } from "../../utils/error";
import { unsafe_cast } from "type_primitives";

function invalid_fields(fn: () => unknown): Record<string, unknown> | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof SlotMapError && e.category === SLOT_MAP_ERROR.INVALID_OPTIONS) {
      return e.context;
    }
    throw e;
  }
  return undefined;
}

describe("resolve_slot_map_options", () => {
  //=========================================================
  // Defaults
  //=========================================================

  it("fills every default", () => {
    const options = resolve_slot_map_options();
    expect(options).toEqual({
      index_bits: 24,
      id_bits: 29,
      min_free_keys: 32,
      allocation_size: 512,
      generation_policy: GENERATION_POLICY.THROW,
      on_release: undefined,
    });
  });

  it("keeps provided values", () => {
    const on_release = (_item: string): void => {};
    const options = resolve_slot_map_options<string>({
      index_bits: 16,
      id_bits: 16,
      min_free_keys: 0,
      allocation_size: 3,
      generation_policy: GENERATION_POLICY.RETIRE,
      on_release,
    });
    expect(options.index_bits).toBe(16);
    expect(options.id_bits).toBe(16);
    expect(options.min_free_keys).toBe(0);
    expect(options.allocation_size).toBe(3);
    expect(options.generation_policy).toBe(GENERATION_POLICY.RETIRE);
    expect(options.on_release).toBe(on_release);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(resolve_slot_map_options())).toBe(true);
  });

  it("accepts the full 53-bit handle width", () => {
    expect(() => resolve_slot_map_options({ index_bits: 32, id_bits: 21 })).not.toThrow();
  });

  //=========================================================
  // Validation
  //=========================================================

  it("rejects field widths outside 1..32", () => {
    expect(invalid_fields(() => resolve_slot_map_options({ index_bits: 0 }))).toEqual({
      index_bits: 0,
    });
    expect(invalid_fields(() => resolve_slot_map_options({ id_bits: 33, index_bits: 8 }))).toEqual({
      id_bits: 33,
    });
    expect(invalid_fields(() => resolve_slot_map_options({ index_bits: 2.5 }))).toEqual({
      index_bits: 2.5,
    });
  });

  it("rejects handles wider than 53 bits", () => {
    expect(invalid_fields(() => resolve_slot_map_options({ index_bits: 32, id_bits: 22 }))).toEqual(
      { handle_bits: 54 },
    );
  });

  it("rejects bad growth settings", () => {
    expect(
      invalid_fields(() => resolve_slot_map_options({ min_free_keys: -1, allocation_size: 0 })),
    ).toEqual({ min_free_keys: -1, allocation_size: 0 });
  });

  it("rejects unknown generation policies", () => {
    const generation_policy = unsafe_cast<GENERATION_POLICY>("LOOP");
    expect(invalid_fields(() => resolve_slot_map_options({ generation_policy }))).toEqual({
      generation_policy: "LOOP",
    });
  });

  it("rejects WRAP with a single generation", () => {
    expect(
      invalid_fields(() =>
        resolve_slot_map_options({ id_bits: 1, generation_policy: GENERATION_POLICY.WRAP }),
      ),
    ).toEqual({ generation_policy: GENERATION_POLICY.WRAP });
  });

  it("rejects a non-function release hook", () => {
    const on_release = unsafe_cast<(item: number) => void>("log");
    expect(invalid_fields(() => resolve_slot_map_options({ on_release }))).toEqual({
      on_release: "string",
    });
  });

  it("names every offending field in the message", () => {
    try {
      resolve_slot_map_options({ index_bits: 0, allocation_size: -4 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(SlotMapError);
      if (!(e instanceof SlotMapError)) return;
      expect(e.message).toBe("invalid slot map options: index_bits, allocation_size");
      expect(e.is_operational).toBe(true);
    }
  });
});
