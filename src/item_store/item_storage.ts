/***
 *
 * ItemStorage - Backing buffers for the dense item store.
 *
 * The store only ever asks its storage to read, write, move one slot
 * onto another, vacate a slot and reallocate. Two backends:
 *
 *   - ObjectItemStorage<T> holds any value. Reallocation moves each
 *     live item into a fresh array one element at a time.
 *   - TypedItemStorage holds numbers in a single TypedArray chosen by
 *     tag. Reallocation is one block copy (TypedArray.set).
 *
 * Positions past the live count are never read through get().
 *
 ***/

import {
  TYPED_ARRAY_MAP,
  unsafe_cast,
  type AnyTypedArray,
  type TypedArrayConstructor,
  type TypedArrayTag,
} from "type_primitives";
import { transfer_live } from "../utils/arrays";
import { NOT_FOUND } from "../utils/constants";

export interface ItemStorage<T> {
  /** Allocated slots. */
  readonly capacity: number;
  /** Fixed element width, or undefined when items are held by reference. */
  readonly bytes_per_item: number | undefined;

  get(position: number): T;
  set(position: number, item: T): void;
  /** Relocate the item at `from` into `to`, leaving `from` vacant. */
  move(from: number, to: number): void;
  vacate(position: number): void;
  /** Reallocate to exactly `capacity` slots, keeping positions 0..live-1. */
  resize(capacity: number, live: number): void;
  /** First position below `live` holding `item`, or -1. */
  index_of(item: T, live: number): number;
}

//=========================================================
// ObjectItemStorage
//=========================================================

export class ObjectItemStorage<T> implements ItemStorage<T> {
  private items: (T | undefined)[] = [];

  public get capacity(): number {
    return this.items.length;
  }

  public get bytes_per_item(): number | undefined {
    return undefined;
  }

  public get(position: number): T {
    return unsafe_cast<T>(this.items[position]);
  }

  public set(position: number, item: T): void {
    this.items[position] = item;
  }

  public move(from: number, to: number): void {
    this.items[to] = this.items[from];
    this.items[from] = undefined;
  }

  // Drops the reference so the collector can reclaim the item.
  public vacate(position: number): void {
    this.items[position] = undefined;
  }

  public resize(capacity: number, live: number): void {
    const next = new Array<T | undefined>(capacity).fill(undefined);
    const n = Math.min(live, capacity);
    for (let i = 0; i < n; i++) next[i] = this.items[i];
    this.items = next;
  }

  public index_of(item: T, live: number): number {
    for (let i = 0; i < live; i++) {
      if (this.items[i] === item) return i;
    }
    return NOT_FOUND;
  }
}

//=========================================================
// TypedItemStorage
//=========================================================

export class TypedItemStorage implements ItemStorage<number> {
  private buf: AnyTypedArray;
  private readonly ctor: TypedArrayConstructor;

  constructor(readonly tag: TypedArrayTag) {
    this.ctor = TYPED_ARRAY_MAP[tag];
    this.buf = new this.ctor(0);
  }

  public get capacity(): number {
    return this.buf.length;
  }

  public get bytes_per_item(): number {
    return this.buf.BYTES_PER_ELEMENT;
  }

  public get(position: number): number {
    return this.buf[position];
  }

  public set(position: number, item: number): void {
    this.buf[position] = item;
  }

  public move(from: number, to: number): void {
    this.buf[to] = this.buf[from];
    this.buf[from] = 0;
  }

  public vacate(position: number): void {
    this.buf[position] = 0;
  }

  public resize(capacity: number, live: number): void {
    this.buf = transfer_live(new this.ctor(capacity), this.buf, live);
  }

  /**
   * Compares stored (already converted) values, so a search for 1.5 in
   * an i32 store finds nothing even though 1.5 was once added as 1.
   */
  public index_of(item: number, live: number): number {
    for (let i = 0; i < live; i++) {
      if (this.buf[i] === item) return i;
    }
    return NOT_FOUND;
  }
}
