import { describe, expect, it } from "vitest";
import { SlotMap } from "../slot_map/slot_map";
import type { SlotHandle } from "../handle/handle";

//=========================================================
// Helpers
//=========================================================

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

const OPTIONS = {
  index_bits: 10,
  id_bits: 20,
  min_free_keys: 4,
  allocation_size: 8,
} as const;

/** Every observable fact about the map agrees with the model. */
function check_against_model(
  map: SlotMap<number>,
  live: Map<SlotHandle, number>,
  stale: SlotHandle[],
): void {
  expect(map.size).toBe(live.size);

  for (const [handle, value] of live) {
    expect(map.is_valid(handle)).toBe(true);
    expect(map.get(handle)).toBe(value);
  }
  for (const handle of stale) {
    expect(map.is_valid(handle)).toBe(false);
    expect(map.get(handle)).toBeUndefined();
  }

  // dense: positions 0..size-1 hold exactly the live values
  const seen: number[] = [];
  for (let position = 0; position < map.size; position++) {
    const handle = map.get_handle(position);
    expect(live.get(handle)).toBe(map.at(position));
    seen.push(map.at(position));
  }
  expect(seen.sort((a, b) => a - b)).toEqual([...live.values()].sort((a, b) => a - b));
  expect([...map].length).toBe(map.size);

  expect(map.size).toBeLessThanOrEqual(map.key_capacity - OPTIONS.min_free_keys);
  expect(map.item_capacity % OPTIONS.allocation_size).toBe(0);
  expect(map.item_capacity).toBeLessThan(map.size + 2 * OPTIONS.allocation_size);
}

//=========================================================
// Scenarios
//=========================================================

describe("scenarios", () => {
  it("removing the middle of three leaves the outer two resolvable", () => {
    const map = new SlotMap<number>();
    const h1 = map.add(10);
    const h2 = map.add(20);
    const h3 = map.add(30);

    expect(map.remove(h2)).toBe(true);

    expect(map.size).toBe(2);
    expect(map.is_valid(h2)).toBe(false);
    expect(map.get(h1)).toBe(10);
    expect(map.get(h3)).toBe(30);
  });

  it("cycling one slot raises its generation on every reuse", () => {
    const map = new SlotMap<number>({ min_free_keys: 0, allocation_size: 1 });
    const issued: SlotHandle[] = [];

    let previous_id = 0;
    for (let i = 0; i < 40; i++) {
      const handle = map.add(i);
      expect(map.handle_index(handle)).toBe(0);
      expect(map.handle_id(handle)).toBeGreaterThan(previous_id);
      previous_id = map.handle_id(handle);

      expect(issued).not.toContain(handle);
      issued.push(handle);
      map.remove(handle);
    }

    expect(previous_id).toBe(40);
    expect(issued.every((handle) => !map.is_valid(handle))).toBe(true);
  });

  it("handles outlive growth past several chunks", () => {
    const map = new SlotMap<number>({ min_free_keys: 2, allocation_size: 4 });
    const handles: SlotHandle[] = [];

    for (let i = 0; i < 4; i++) handles.push(map.add(i * 100));
    const before = map.item_capacity;

    for (let i = 4; i < 50; i++) handles.push(map.add(i * 100));

    expect(map.item_capacity).toBeGreaterThan(before);
    handles.forEach((handle, i) => expect(map.get(handle)).toBe(i * 100));
  });

  it("clear leaves nothing valid and the map reusable", () => {
    const map = new SlotMap<number>(OPTIONS);
    const handles = Array.from({ length: 20 }, (_, i) => map.add(i));

    map.clear();

    expect(map.size).toBe(0);
    expect(handles.some((handle) => map.is_valid(handle))).toBe(false);

    const next = map.add(99);
    expect(handles).not.toContain(next);
    expect(map.get(next)).toBe(99);
  });
});

//=========================================================
// Randomized
//=========================================================

describe("randomized operations", () => {
  for (const seed of [1, 7, 1234, 987654]) {
    it(`agrees with a model (seed ${seed})`, () => {
      const random = xorshift32(seed);
      const map = new SlotMap<number>(OPTIONS);
      const live = new Map<SlotHandle, number>();
      const stale: SlotHandle[] = [];
      let next_value = 0;

      const pick_live = (): SlotHandle => {
        const handles = [...live.keys()];
        return handles[Math.floor(random() * handles.length)];
      };

      for (let step = 0; step < 600; step++) {
        const roll = random();

        if (roll < 0.55 || live.size === 0) {
          const handle = map.add(next_value);
          expect(live.has(handle)).toBe(false);
          expect(stale).not.toContain(handle);
          live.set(handle, next_value++);
        } else if (roll < 0.85) {
          const handle = pick_live();
          expect(map.take(handle)).toBe(live.get(handle));
          live.delete(handle);
          stale.push(handle);
        } else if (roll < 0.9) {
          const handle = pick_live();
          map.set(handle, next_value);
          live.set(handle, next_value++);
        } else if (roll < 0.97) {
          if (stale.length > 0) {
            expect(map.remove(stale[Math.floor(random() * stale.length)])).toBe(false);
          }
        } else if (roll < 0.99) {
          const position = Math.floor(random() * map.size);
          const handle = map.get_handle(position);
          map.remove_at(position);
          live.delete(handle);
          stale.push(handle);
        } else {
          map.clear();
          for (const handle of live.keys()) stale.push(handle);
          live.clear();
        }

        check_against_model(map, live, stale);
      }
    });
  }
});
