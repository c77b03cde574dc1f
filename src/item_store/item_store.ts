/***
 *
 * ItemStore - Dense, swap-compacted item storage.
 *
 * Live items occupy positions 0..count-1 with no gaps, so iteration is
 * a plain linear scan. A parallel Uint32Array, key_offsets, records
 * which key owns each position: the inverse of KeyTable.indices for
 * live keys. Removal moves the last item into the hole and reports the
 * moved item's key so the caller can repoint it.
 *
 * Capacity changes in `allocation_size` chunks. Growth happens on push
 * when full; shrink_if_sparse() gives memory back once two whole chunks
 * sit unused. key_offsets is always reallocated alongside the items.
 *
 ***/

import type { ItemStorage } from "./item_storage";
import { SLOT_MAP_ERROR, SlotMapError } from "../utils/error";
import { SHRINK_SLACK_CHUNKS } from "../utils/constants";
import { next_chunk_above, round_up_to_chunk, transfer_live } from "../utils/arrays";

export class ItemStore<T> {
  private key_offsets: Uint32Array = new Uint32Array(0);
  private item_count = 0;

  constructor(
    private readonly storage: ItemStorage<T>,
    private readonly allocation_size: number,
  ) {}

  //=========================================================
  // Queries
  //=========================================================

  public get count(): number {
    return this.item_count;
  }

  public get capacity(): number {
    return this.storage.capacity;
  }

  public get bytes_per_item(): number | undefined {
    return this.storage.bytes_per_item;
  }

  public get(position: number): T {
    return this.storage.get(position);
  }

  /** Key offset that owns `position`. */
  public owner_of(position: number): number {
    return this.key_offsets[position];
  }

  public index_of(item: T): number {
    return this.storage.index_of(item, this.item_count);
  }

  //=========================================================
  // Mutations
  //=========================================================

  public set(position: number, item: T): void {
    this.storage.set(position, item);
  }

  /** Append `item` owned by `key`. Returns its position. */
  public push(item: T, key: number): number {
    if (this.item_count === this.storage.capacity) {
      this.resize(next_chunk_above(this.item_count, this.allocation_size));
    }
    const position = this.item_count++;
    this.key_offsets[position] = key;
    this.storage.set(position, item);
    return position;
  }

  /**
   * Remove the item at `position` by moving the last item into it.
   *
   * When `position` already is the last slot there is nothing to move
   * and the slot is vacated in place. Either way the return value is
   * the key that now owns `position` (the removed item's own key in
   * the in-place case).
   */
  public swap_remove(position: number): number {
    const last = --this.item_count;
    const moved_key = this.key_offsets[last];

    if (position === last) {
      this.storage.vacate(position);
    } else {
      this.key_offsets[position] = moved_key;
      this.storage.move(last, position);
    }

    return moved_key;
  }

  public shrink_if_sparse(): void {
    const slack = SHRINK_SLACK_CHUNKS * this.allocation_size;
    if (this.storage.capacity >= this.item_count + slack) {
      this.resize(round_up_to_chunk(this.item_count, this.allocation_size));
    }
  }

  /** Release both buffers. Items must already have been handed back. */
  public reset(): void {
    this.item_count = 0;
    this.key_offsets = new Uint32Array(0);
    this.storage.resize(0, 0);
  }

  //=========================================================
  // Internal
  //=========================================================

  private resize(capacity: number): void {
    if (capacity < this.item_count) {
      throw new SlotMapError(
        SLOT_MAP_ERROR.INVALID_RESIZE,
        "cannot shrink item storage below the live item count",
        { capacity, item_count: this.item_count },
      );
    }
    if (capacity === this.storage.capacity) return;

    this.key_offsets = transfer_live(new Uint32Array(capacity), this.key_offsets, this.item_count);
    this.storage.resize(capacity, this.item_count);
  }
}
