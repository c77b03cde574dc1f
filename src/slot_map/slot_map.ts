/***
 * SlotMap: Generational slot allocator.
 *
 * Stores items of one type densely (positions 0..size-1, no gaps) and
 * hands out handles that survive every insertion and removal except
 * the removal of their own item. A stale handle is detected with one
 * table lookup and is never an error: lookups answer `undefined` and
 * handle-based removal answers `false`.
 *
 * Architecture: three parts behind one owner.
 * - HandleLayout packs (key offset, generation) into one number
 * - KeyTable maps a key offset to an item position and keeps the FIFO
 *   free list and the generation counters
 * - ItemStore keeps the items packed plus the position → key inverse,
 *   swap-compacting on removal
 *
 * Two access paths:
 * - checked: handle-based (get, set, remove, take, is_valid)
 * - unchecked: position-based (at, remove_at, get_handle), for callers
 *   walking the dense store. Positions are asserted under __DEV__ only
 *   and are invalidated by any add or remove.
 *
 * Usage:
 *
 *   const bodies = new SlotMap<Body>({ on_release: (b) => b.detach() });
 *
 *   const a = bodies.add(new Body("a"));
 *   const b = bodies.add_with((handle) => new Body("b", handle));
 *
 *   bodies.get(a);       // Body "a"
 *   bodies.remove(a);    // true
 *   bodies.get(a);       // undefined, even once the key is reused
 *
 *   for (const body of bodies) body.step();
 *
 *   // numbers in one Float64Array
 *   const weights = SlotMap.typed("f64");
 *   const w = weights.add(0.5);
 *
 ***/

import { HandleLayout, type SlotHandle } from "../handle/handle";
import { GENERATION_POLICY, KeyTable } from "../key_table/key_table";
import { ItemStore } from "../item_store/item_store";
import {
  ObjectItemStorage,
  TypedItemStorage,
  type ItemStorage,
} from "../item_store/item_storage";
import {
  resolve_slot_map_options,
  type ResolvedSlotMapOptions,
  type SlotMapOptions,
} from "./options";
import { is_typed_array_tag, type TypedArrayTag } from "type_primitives";
import { SLOT_MAP_ERROR, SlotMapError } from "../utils/error";
import { NOT_FOUND } from "../utils/constants";

export class SlotMap<T> implements Iterable<T> {
  readonly options: ResolvedSlotMapOptions<T>;
  readonly layout: HandleLayout;

  private readonly keys: KeyTable;
  private readonly items: ItemStore<T>;
  private disposed = false;

  /**
   * @param storage - Backing buffers for the items. Defaults to a plain
   *   array that holds any value; see SlotMap.typed for numeric items.
   */
  constructor(options?: SlotMapOptions<T>, storage?: ItemStorage<T>) {
    this.options = resolve_slot_map_options(options);
    const { index_bits, id_bits, allocation_size, generation_policy } = this.options;

    this.layout = new HandleLayout(index_bits, id_bits);
    this.keys = new KeyTable(
      this.layout.index_max + 1,
      allocation_size,
      this.layout.id_max,
      generation_policy,
    );
    this.items = new ItemStore(storage ?? new ObjectItemStorage<T>(), allocation_size);
  }

  /** A map of numbers kept in a single TypedArray of the given element type. */
  public static typed(tag: TypedArrayTag, options?: SlotMapOptions<number>): SlotMap<number> {
    if (!is_typed_array_tag(tag)) {
      throw new SlotMapError(SLOT_MAP_ERROR.INVALID_OPTIONS, `unknown typed array tag: ${tag}`, {
        tag,
      });
    }
    return new SlotMap<number>(options, new TypedItemStorage(tag));
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of live items. */
  public get size(): number {
    return this.items.count;
  }

  /** Live items times the element width, for typed storage only. */
  public get size_bytes(): number | undefined {
    const width = this.items.bytes_per_item;
    return width === undefined ? undefined : this.items.count * width;
  }

  public get key_capacity(): number {
    return this.keys.count;
  }

  public get item_capacity(): number {
    return this.items.capacity;
  }

  public get free_key_count(): number {
    return this.keys.free_count;
  }

  /** Keys withdrawn under GENERATION_POLICY.RETIRE. */
  public get retired_key_count(): number {
    return this.keys.retired_count;
  }

  public get is_disposed(): boolean {
    return this.disposed;
  }

  public handle_index(handle: SlotHandle): number {
    return this.layout.get_index(handle);
  }

  public handle_id(handle: SlotHandle): number {
    return this.layout.get_id(handle);
  }

  /**
   * True while the handle's item is alive.
   *
   * The handle must not be null (ID 0), its key offset must be inside
   * the table and that key must still carry the handle's ID. Free keys
   * also carry an ID, so the key must finally own a live position.
   * Anything else, including values that were never handles or that
   * came from another map, is simply false.
   */
  public is_valid(handle: SlotHandle): boolean {
    return this.find_key(handle) !== NOT_FOUND;
  }

  /** The handle's item, or undefined when the handle is stale or null. */
  public get(handle: SlotHandle): T | undefined {
    const key = this.find_key(handle);
    if (key === NOT_FOUND) return undefined;
    return this.items.get(this.keys.index_of(key));
  }

  /** Item at a dense position. Unchecked outside __DEV__. */
  public at(position: number): T {
    this.check_position(position);
    return this.items.get(position);
  }

  /** Handle of the item at a dense position. Unchecked outside __DEV__. */
  public get_handle(position: number): SlotHandle {
    this.check_position(position);
    const key = this.items.owner_of(position);
    return this.layout.create_handle(key, this.keys.id_of(key));
  }

  /**
   * Handle of a stored item, found by identity (===).
   * Linear in size; prefer keeping the handle. Throws ITEM_NOT_FOUND.
   */
  public get_handle_of(item: T): SlotHandle {
    return this.get_handle(this.locate(item));
  }

  //=========================================================
  // Mutations
  //=========================================================

  public add(item: T): SlotHandle {
    this.prepare_add();
    const key = this.keys.issue(this.items.count);
    this.items.push(item, key);
    return this.layout.create_handle(key, this.keys.id_of(key));
  }

  /**
   * Build the item from the handle it will be stored under.
   *
   * The factory runs before anything is committed: if it throws, the
   * map is unchanged. It must not add to or dispose the map.
   */
  public add_with(factory: (handle: SlotHandle) => T): SlotHandle {
    this.prepare_add();
    const key = this.keys.next_free;
    const handle = this.layout.create_handle(key, this.keys.id_of(key));

    const item = factory(handle);

    if (
      this.disposed ||
      this.keys.free_count === 0 ||
      this.keys.next_free !== key ||
      this.keys.id_of(key) !== this.layout.get_id(handle)
    ) {
      throw new SlotMapError(
        SLOT_MAP_ERROR.CONCURRENT_MODIFICATION,
        "the map was modified while add_with's factory was running",
        { key },
      );
    }

    this.keys.issue(this.items.count);
    this.items.push(item, key);
    return handle;
  }

  /** Replace the handle's item. False when the handle is stale. */
  public set(handle: SlotHandle, item: T): boolean {
    const key = this.find_key(handle);
    if (key === NOT_FOUND) return false;
    this.items.set(this.keys.index_of(key), item);
    return true;
  }

  /** Remove the handle's item. False when the handle is stale. */
  public remove(handle: SlotHandle): boolean {
    const key = this.find_key(handle);
    if (key === NOT_FOUND) return false;
    this.remove_key(key);
    return true;
  }

  /** Remove and return the handle's item, or undefined when stale. */
  public take(handle: SlotHandle): T | undefined {
    const key = this.find_key(handle);
    if (key === NOT_FOUND) return undefined;
    return this.remove_key(key);
  }

  /** Remove the item at a dense position. Unchecked outside __DEV__. */
  public remove_at(position: number): void {
    this.check_position(position);
    this.remove_key(this.items.owner_of(position));
  }

  /** Remove a stored item found by identity (===). Throws ITEM_NOT_FOUND. */
  public remove_item(item: T): void {
    this.remove_at(this.locate(item));
  }

  /**
   * Remove every item, last position first, so nothing moves. Each key
   * moves to its next generation and rejoins the free list.
   *
   * Under GENERATION_POLICY.THROW every live key is checked up front,
   * so an exhausted key aborts the clear before anything is removed.
   *
   * Only the items live at the start are removed; anything on_release
   * adds along the way stays.
   */
  public clear(): void {
    if (this.options.generation_policy === GENERATION_POLICY.THROW) {
      for (let position = 0; position < this.items.count; position++) {
        const key = this.items.owner_of(position);
        if (!this.keys.can_invalidate(key)) {
          throw new SlotMapError(SLOT_MAP_ERROR.GENERATION_EXHAUSTED, undefined, {
            key,
            id: this.keys.id_of(key),
            id_max: this.layout.id_max,
          });
        }
      }
    }

    for (let position = this.items.count - 1; position >= 0; position--) {
      if (position >= this.items.count) continue;
      this.remove_key(this.items.owner_of(position));
    }
  }

  /**
   * Release every item and free both tables. The map refuses further
   * additions: a fresh key table would reissue handles that are still
   * held somewhere. Idempotent.
   */
  public dispose(): void {
    if (this.disposed) return;

    const on_release = this.options.on_release;
    const released: T[] = [];
    if (on_release !== undefined) {
      for (let position = this.items.count - 1; position >= 0; position--) {
        released.push(this.items.get(position));
      }
    }

    this.items.reset();
    this.keys.reset();
    this.disposed = true;

    if (on_release !== undefined) {
      for (let i = 0; i < released.length; i++) on_release(released[i]);
    }
  }

  //=========================================================
  // Iteration
  //=========================================================

  /** Live items in position order. Do not add or remove while iterating. */
  [Symbol.iterator](): Iterator<T> {
    let position = 0;
    const items = this.items;
    const count = items.count;
    return {
      next(): IteratorResult<T> {
        if (position < count) return { value: items.get(position++), done: false };
        return { value: undefined, done: true };
      },
    };
  }

  public *values(): IterableIterator<T> {
    for (let position = 0; position < this.items.count; position++) {
      yield this.items.get(position);
    }
  }

  public *handles(): IterableIterator<SlotHandle> {
    for (let position = 0; position < this.items.count; position++) {
      yield this.get_handle(position);
    }
  }

  public *entries(): IterableIterator<[SlotHandle, T]> {
    for (let position = 0; position < this.items.count; position++) {
      yield [this.get_handle(position), this.items.get(position)];
    }
  }

  public for_each(fn: (item: T, position: number) => void): void {
    const count = this.items.count;
    for (let position = 0; position < count; position++) {
      fn(this.items.get(position), position);
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private find_key(handle: SlotHandle): number {
    const key = this.layout.get_index(handle);
    if (!this.keys.is_current(key, this.layout.get_id(handle))) return NOT_FOUND;
    const position = this.keys.index_of(key);
    return position < this.items.count && this.items.owner_of(position) === key
      ? key
      : NOT_FOUND;
  }

  private locate(item: T): number {
    const position = this.items.index_of(item);
    if (position === NOT_FOUND) {
      throw new SlotMapError(SLOT_MAP_ERROR.ITEM_NOT_FOUND, undefined, { size: this.items.count });
    }
    return position;
  }

  private check_position(position: number): void {
    if (
      __DEV__ &&
      !(Number.isInteger(position) && position >= 0 && position < this.items.count)
    ) {
      throw new SlotMapError(SLOT_MAP_ERROR.POSITION_OUT_OF_RANGE, undefined, {
        position,
        size: this.items.count,
      });
    }
  }

  private prepare_add(): void {
    if (this.disposed) {
      throw new SlotMapError(SLOT_MAP_ERROR.DISPOSED);
    }
    this.keys.reserve(this.options.min_free_keys);
    if (this.keys.free_count === 0) {
      throw new SlotMapError(
        SLOT_MAP_ERROR.INDEX_SPACE_EXHAUSTED,
        "reached the maximum key count, consider increasing index_bits",
        {
          key_count: this.keys.count,
          index_bits: this.layout.index_bits,
          retired: this.keys.retired_count,
        },
      );
    }
  }

  /**
   * Remove the item owned by `key`, a live key.
   *
   * 1. Move the key to its next generation (may throw, before any change).
   * 2. Swap-remove its position; the last item fills the hole.
   * 3. Repoint the key that owns the filled position (the removed key
   *    itself when it already was last).
   * 4. Append the key to the free list unless it was retired.
   * 5. Shrink the item store if it is now sparse.
   * 6. Hand the removed item to on_release.
   */
  private remove_key(key: number): T {
    const relink = this.keys.invalidate(key);
    const position = this.keys.index_of(key);
    const removed = this.items.get(position);

    const moved_key = this.items.swap_remove(position);
    this.keys.set_index(moved_key, position);

    if (relink) this.keys.release(key);
    this.items.shrink_if_sparse();

    this.options.on_release?.(removed);
    return removed;
  }
}
