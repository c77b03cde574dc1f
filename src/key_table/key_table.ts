/***
 *
 * KeyTable - Indirection layer between handles and item positions.
 *
 * Each key is one entry across two parallel Uint32Arrays:
 *   - indices[key]: the live item's store position, or, while the key
 *     is free, the offset of the next free key
 *   - ids[key]:     the key's current generation (0 = never valid)
 *
 * Free keys form a FIFO list threaded through `indices`, held as
 * head / tail plus a free count. Reusing the oldest free key first
 * spreads generation bumps over every key instead of cycling one,
 * which pushes back the point where any single ID runs out.
 *
 * The table grows in whole `allocation_size` chunks and never shrinks: a
 * smaller table would hand out an index/ID pair that an outstanding
 * handle still holds.
 *
 ***/

import { SLOT_MAP_ERROR, SlotMapError } from "../utils/error";
import { INITIAL_ID, NULL_ID } from "../utils/constants";
import { round_up_to_chunk, transfer_live } from "../utils/arrays";

/**
 * What happens when a key whose ID already sits at `id_max` loses
 * its item.
 */
export enum GENERATION_POLICY {
  /** Refuse the removal with GENERATION_EXHAUSTED. Nothing changes. */
  THROW = "THROW",
  /** Zero the ID and never reissue the key. */
  RETIRE = "RETIRE",
  /** Restart at 1. A very old stale handle may validate again. */
  WRAP = "WRAP",
}

export class KeyTable {
  private indices: Uint32Array = new Uint32Array(0);
  private ids: Uint32Array = new Uint32Array(0);
  private key_count = 0;

  private head = 0;
  private tail = 0;
  private free = 0;
  private retired = 0;

  constructor(
    private readonly max_keys: number,
    private readonly allocation_size: number,
    private readonly id_max: number,
    private readonly policy: GENERATION_POLICY,
  ) {}

  //=========================================================
  // Queries
  //=========================================================

  /** Allocated keys, free and retired ones included. */
  public get count(): number {
    return this.key_count;
  }

  public get free_count(): number {
    return this.free;
  }

  public get retired_count(): number {
    return this.retired;
  }

  /** Offset of the key the next issue() hands out. Meaningless while free_count is 0. */
  public get next_free(): number {
    return this.head;
  }

  public id_of(key: number): number {
    return this.ids[key];
  }

  public index_of(key: number): number {
    return this.indices[key];
  }

  /**
   * True when `key` exists and still carries `id`.
   * Out-of-range, negative and fractional offsets read `undefined`
   * from the typed array and fail the comparison.
   */
  public is_current(key: number, id: number): boolean {
    return id !== NULL_ID && key < this.key_count && this.ids[key] === id;
  }

  /** False only when invalidate() would throw for this key. */
  public can_invalidate(key: number): boolean {
    return this.ids[key] < this.id_max || this.policy !== GENERATION_POLICY.THROW;
  }

  //=========================================================
  // Mutations
  //=========================================================

  public set_index(key: number, position: number): void {
    this.indices[key] = position;
  }

  /**
   * When no more than `min_free` keys are free, grow by as many whole
   * chunks as it takes to leave more than `min_free` free. Capped at
   * `max_keys`, so the caller must still check free_count.
   */
  public reserve(min_free: number): void {
    if (this.free > min_free) return;
    this.grow(min_free + 1 - this.free);
  }

  /** Take the free-list head and point it at `position`. */
  public issue(position: number): number {
    if (this.free === 0) {
      throw new SlotMapError(SLOT_MAP_ERROR.INDEX_SPACE_EXHAUSTED, undefined, {
        key_count: this.key_count,
        max_keys: this.max_keys,
      });
    }
    const key = this.head;
    this.head = this.indices[key];
    this.indices[key] = position;
    this.free--;
    return key;
  }

  /**
   * Move `key` to its next generation so every handle that carries
   * the current one goes stale.
   *
   * Returns false when the key was retired and must not be released
   * back onto the free list.
   */
  public invalidate(key: number): boolean {
    const id = this.ids[key];
    if (id < this.id_max) {
      this.ids[key] = id + 1;
      return true;
    }

    switch (this.policy) {
      case GENERATION_POLICY.THROW:
        throw new SlotMapError(SLOT_MAP_ERROR.GENERATION_EXHAUSTED, undefined, {
          key,
          id,
          id_max: this.id_max,
        });
      case GENERATION_POLICY.RETIRE:
        this.ids[key] = NULL_ID;
        this.retired++;
        return false;
      case GENERATION_POLICY.WRAP:
        this.ids[key] = INITIAL_ID;
        return true;
    }
  }

  /** Append `key` to the free-list tail. */
  public release(key: number): void {
    if (this.free === 0) {
      this.head = key;
    } else {
      this.indices[this.tail] = key;
    }
    this.tail = key;
    this.free++;
  }

  /** Drop every key. Only for disposal: earlier handles could validate again. */
  public reset(): void {
    this.indices = new Uint32Array(0);
    this.ids = new Uint32Array(0);
    this.key_count = 0;
    this.head = 0;
    this.tail = 0;
    this.free = 0;
    this.retired = 0;
  }

  //=========================================================
  // Internal
  //=========================================================

  private grow(needed: number): void {
    if (this.key_count >= this.max_keys) return;

    const old_count = this.key_count;
    const next_count = Math.min(
      round_up_to_chunk(old_count + needed, this.allocation_size),
      this.max_keys,
    );

    this.indices = transfer_live(new Uint32Array(next_count), this.indices, old_count);
    this.ids = transfer_live(new Uint32Array(next_count), this.ids, old_count);

    // Each new key links to its neighbour. The tail's link is only
    // read when the list runs empty, and head is reset before reuse.
    for (let key = old_count; key < next_count; key++) {
      this.indices[key] = key + 1;
      this.ids[key] = INITIAL_ID;
    }

    if (this.free === 0) {
      this.head = old_count;
    } else {
      this.indices[this.tail] = old_count;
    }
    this.tail = next_count - 1;
    this.free += next_count - old_count;
    this.key_count = next_count;
  }
}
