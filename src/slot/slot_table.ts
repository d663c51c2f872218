/***
 *
 * SlotTable — Growable column storage for slots.
 *
 * One row per slot, split over four columns:
 *
 *   generations  GrowableUint32Array   bumped on every vacate
 *   links        GrowableFloat64Array  OCCUPIED_LINK, RETIRED_LINK, or next free index / END
 *   inserted_at  GrowableFloat64Array  lease timestamp while occupied
 *   values       (V | undefined)[]     payload while occupied
 *
 * The link column doubles as the slot tag: a row is Occupied iff its link
 * is OCCUPIED_LINK. A row whose generation is spent is RETIRED_LINK:
 * Vacant for good and never threaded on a free list. Rows are appended Vacant and never removed, so indices
 * stay stable for the table's lifetime. Backing buffers grow by doubling;
 * the logical length grows one row at a time.
 *
 * The table knows nothing about keys or the free list head. It trusts its
 * caller to only occupy Vacant rows and only vacate Occupied ones.
 *
 ***/

import {
  GrowableFloat64Array,
  GrowableUint32Array,
  unsafe_cast,
} from "type_primitives";
import { is_final_generation } from "../key";
import { LEASE_ERROR, LeaseError } from "../utils/error";
import {
  DEFAULT_INITIAL_CAPACITY,
  END_OF_FREE_LIST,
  INITIAL_GENERATION,
  MAX_CAPACITY,
  OCCUPIED_LINK,
  RETIRED_LINK,
} from "../utils/constants";
import { SLOT, type Slot } from "./slot";
import type { FreeLinks } from "../free_list/free_list";

export class SlotTable<V> implements FreeLinks {
  private readonly generations: GrowableUint32Array;
  private readonly links: GrowableFloat64Array;
  private readonly inserted_at: GrowableFloat64Array;
  private readonly values: (V | undefined)[] = [];

  constructor(
    public readonly max_capacity: number = MAX_CAPACITY,
    reserve: number = DEFAULT_INITIAL_CAPACITY,
  ) {
    this.generations = new GrowableUint32Array(reserve);
    this.links = new GrowableFloat64Array(reserve);
    this.inserted_at = new GrowableFloat64Array(reserve);
  }

  /** Number of slots, occupied or not. Never shrinks. */
  public get length(): number {
    return this.links.length;
  }

  //=========================================================
  // Growth
  //=========================================================

  /**
   * Append one Vacant slot at the initial generation and return its index.
   * The new slot is not linked into any free list.
   */
  public append_vacant(): number {
    const index = this.links.length;
    if (index >= this.max_capacity) {
      throw new LeaseError(
        LEASE_ERROR.CAPACITY_EXCEEDED,
        `Slot table is full at ${this.max_capacity} slots`,
        { max_capacity: this.max_capacity },
      );
    }

    this.generations.push(INITIAL_GENERATION);
    this.links.push(END_OF_FREE_LIST);
    this.inserted_at.push(0);
    this.values.push(undefined);
    return index;
  }

  /** Size the backing columns for `count` slots without changing length. */
  public reserve(count: number): void {
    this.generations.ensure_capacity(count);
    this.links.ensure_capacity(count);
    this.inserted_at.ensure_capacity(count);
  }

  //=========================================================
  // State transitions
  //=========================================================

  /** Vacant → Occupied. Returns the slot's (unchanged) generation. */
  public occupy(index: number, value: V, now: number): number {
    this.links.set_at(index, OCCUPIED_LINK);
    this.inserted_at.set_at(index, now);
    this.values[index] = value;
    return this.generations.get(index);
  }

  /**
   * Occupied → Vacant. Bumps the generation so keys for this tenancy go
   * stale, drops the table's reference to the value and returns it.
   * The link is left as END until the free list threads the slot.
   *
   * A slot already at MAX_GENERATION keeps its generation and is retired
   * instead; reusing it would alias keys issued for earlier tenancies.
   */
  public vacate(index: number): V {
    const value = this.value_of(index);
    this.values[index] = undefined;
    const generation = this.generations.get(index);
    if (is_final_generation(generation)) {
      this.links.set_at(index, RETIRED_LINK);
    } else {
      this.links.set_at(index, END_OF_FREE_LIST);
      this.generations.set_at(index, generation + 1);
    }
    return value;
  }

  //=========================================================
  // Column access
  //=========================================================

  public is_occupied(index: number): boolean {
    return this.links.get(index) === OCCUPIED_LINK;
  }

  /** Vacant and never handed out again. */
  public is_retired(index: number): boolean {
    return this.links.get(index) === RETIRED_LINK;
  }

  public generation_of(index: number): number {
    return this.generations.get(index);
  }

  /** Payload of an Occupied slot. Callers check occupancy first. */
  public value_of(index: number): V {
    return unsafe_cast<V>(this.values[index]);
  }

  public set_value(index: number, value: V): void {
    this.values[index] = value;
  }

  public inserted_at_of(index: number): number {
    return this.inserted_at.get(index);
  }

  public link_of(index: number): number {
    return this.links.get(index);
  }

  public set_link(index: number, link: number): void {
    this.links.set_at(index, link);
  }

  /** Tagged view of one slot, or undefined when out of range. */
  public slot(index: number): Slot<V> | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      return undefined;
    }
    const generation = this.generations.get(index);
    if (this.is_occupied(index)) {
      return {
        tag: SLOT.OCCUPIED,
        generation,
        value: this.value_of(index),
        inserted_at: this.inserted_at.get(index),
      };
    }
    return {
      tag: SLOT.VACANT,
      generation,
      next_free: this.links.get(index),
    };
  }
}
