/***
 * LeaseMap — Public container facade.
 *
 * A key-value map for entries that come and go at high frequency. Keys
 * are handed out by the map: inserting takes the most recently vacated
 * slot (or appends a new one), removing frees the slot for the next
 * insert. Composes SlotTable (storage) and FreeList (reuse order).
 *
 * Keys are generational. Each removal bumps the slot's generation, so a
 * key held past its tenancy resolves to nothing, even after the slot is
 * reused. Misuse of keys is never an error: lookups, updates and removals
 * through a stale, foreign or malformed key report absence.
 *
 * All operations are O(1) amortised; iteration, drain, clear and
 * eviction walk the table in ascending index order.
 *
 * Usage:
 *
 *   const sessions = LeaseMap.with_capacity<Session>(64);
 *
 *   const key = sessions.insert(session);
 *   sessions.get(key);                    // Session
 *   sessions.update(key, (s) => ({ ...s, seen: true }));
 *
 *   sessions.remove(key);                 // Session, slot freed
 *   sessions.get(key);                    // undefined, even once reused
 *
 *   // drop leases older than 30s
 *   sessions.evict_older_than(30_000);
 *
 ***/

import { is_non_negative_integer } from "type_primitives";
import {
  create_lease_key,
  get_key_generation,
  get_key_index,
  type LeaseKey,
} from "./key";
import { FreeList } from "./free_list/free_list";
import { SlotTable } from "./slot/slot_table";
import type { Slot } from "./slot/slot";
import { LEASE_ERROR, LeaseError } from "./utils/error";
import {
  DEFAULT_INITIAL_CAPACITY,
  MAX_CAPACITY,
  UNASSIGNED,
} from "./utils/constants";

export interface LeaseMapOptions {
  /** Upper bound on slots. Inserting past it throws CAPACITY_EXCEEDED. */
  max_capacity?: number;
  /** Timestamp source for lease ages. Defaults to performance.now(). */
  clock?: () => number;
  /** Initial backing-buffer size. Does not create slots. */
  reserve?: number;
}

const default_clock = (): number => performance.now();

function validate_option(name: string, value: number, max: number): number {
  if (!is_non_negative_integer(value) || value > max) {
    throw new LeaseError(
      LEASE_ERROR.INVALID_OPTION,
      `${name} must be an integer in [0, ${max}]`,
      { [name]: value },
    );
  }
  return value;
}

export class LeaseMap<V> implements Iterable<[LeaseKey, V]> {
  private readonly table: SlotTable<V>;
  private readonly free: FreeList;
  private readonly clock: () => number;
  private occupied_count = 0;

  constructor(options?: LeaseMapOptions) {
    const max_capacity = validate_option(
      "max_capacity",
      options?.max_capacity ?? MAX_CAPACITY,
      MAX_CAPACITY,
    );
    const reserve = validate_option(
      "reserve",
      options?.reserve ?? Math.min(DEFAULT_INITIAL_CAPACITY, max_capacity),
      max_capacity,
    );
    this.table = new SlotTable<V>(max_capacity, reserve);
    this.free = new FreeList(this.table);
    this.clock = options?.clock ?? default_clock;
  }

  /**
   * Create a map with `capacity` Vacant slots already in the table.
   * They are handed out in ascending index order.
   */
  public static with_capacity<V>(
    capacity: number,
    options?: LeaseMapOptions,
  ): LeaseMap<V> {
    if (!is_non_negative_integer(capacity)) {
      throw new LeaseError(
        LEASE_ERROR.INVALID_CAPACITY,
        "Capacity must be a non-negative integer",
        { capacity },
      );
    }
    const map = new LeaseMap<V>(options);
    if (capacity > map.table.max_capacity) {
      throw new LeaseError(
        LEASE_ERROR.CAPACITY_EXCEEDED,
        `Requested ${capacity} slots, limit is ${map.table.max_capacity}`,
        { capacity, max_capacity: map.table.max_capacity },
      );
    }
    map.table.reserve(capacity);
    for (let i = 0; i < capacity; i++) map.table.append_vacant();
    map.free.thread_fresh(0, capacity);
    return map;
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of occupied slots. */
  public get size(): number {
    return this.occupied_count;
  }

  /** Number of slots in the table, occupied or vacant. Never shrinks. */
  public get capacity(): number {
    return this.table.length;
  }

  public get is_empty(): boolean {
    return this.occupied_count === 0;
  }

  public get max_capacity(): number {
    return this.table.max_capacity;
  }

  public contains_key(key: LeaseKey): boolean {
    return this.resolve(key) !== UNASSIGNED;
  }

  public get(key: LeaseKey): V | undefined {
    const index = this.resolve(key);
    if (index === UNASSIGNED) return undefined;
    return this.table.value_of(index);
  }

  /** Time since the entry was inserted, in clock units. */
  public age_of(key: LeaseKey): number | undefined {
    const index = this.resolve(key);
    if (index === UNASSIGNED) return undefined;
    return this.clock() - this.table.inserted_at_of(index);
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Store a value and return its key.
   *
   * Reuses the most recently vacated slot if there is one, otherwise
   * appends a slot to the table. Throws CAPACITY_EXCEEDED when the
   * table is full and no slot is free.
   */
  public insert(value: V): LeaseKey {
    const now = this.clock();
    const index = this.free.pop() ?? this.table.append_vacant();
    const generation = this.table.occupy(index, value, now);
    this.occupied_count++;
    return create_lease_key(index, generation);
  }

  /**
   * Remove the entry and return its value, or undefined if the key does
   * not resolve. The slot's generation is bumped and its index becomes
   * the next one handed out, unless the generation is spent, in which
   * case the slot is retired.
   */
  public remove(key: LeaseKey): V | undefined {
    const index = this.resolve(key);
    if (index === UNASSIGNED) return undefined;
    return this.release(index);
  }

  /** Replace the value in place. Returns false if the key does not resolve. */
  public set(key: LeaseKey, value: V): boolean {
    const index = this.resolve(key);
    if (index === UNASSIGNED) return false;
    this.table.set_value(index, value);
    return true;
  }

  /**
   * Replace the value with `fn(current)`. Returns false if the key does
   * not resolve, before or after `fn` runs.
   */
  public update(key: LeaseKey, fn: (value: V) => V): boolean {
    const before = this.resolve(key);
    if (before === UNASSIGNED) return false;
    const next = fn(this.table.value_of(before));
    // fn may have removed the entry, or cleared or drained the map
    const index = this.resolve(key);
    if (index === UNASSIGNED) return false;
    this.table.set_value(index, next);
    return true;
  }

  /**
   * Remove every entry whose age is strictly greater than `max_age`.
   * Returns how many were removed.
   */
  public evict_older_than(max_age: number): number {
    const now = this.clock();
    let evicted = 0;
    for (let i = 0; i < this.table.length; i++) {
      if (
        this.table.is_occupied(i) &&
        now - this.table.inserted_at_of(i) > max_age
      ) {
        this.release(i);
        evicted++;
      }
    }
    return evicted;
  }

  /** Remove every entry. Capacity is unchanged. */
  public clear(): void {
    for (let i = 0; i < this.table.length; i++) {
      if (this.table.is_occupied(i)) this.release(i);
    }
  }

  //=========================================================
  // Iteration
  //=========================================================

  /**
   * Live entries in ascending index order. Lazy; call again to restart.
   * Inserting or removing while iterating gives unspecified results.
   */
  public *entries(): IterableIterator<[LeaseKey, V]> {
    for (let i = 0; i < this.table.length; i++) {
      if (this.table.is_occupied(i)) {
        yield [
          create_lease_key(i, this.table.generation_of(i)),
          this.table.value_of(i),
        ];
      }
    }
  }

  public *keys(): IterableIterator<LeaseKey> {
    for (let i = 0; i < this.table.length; i++) {
      if (this.table.is_occupied(i)) {
        yield create_lease_key(i, this.table.generation_of(i));
      }
    }
  }

  public *values(): IterableIterator<V> {
    for (let i = 0; i < this.table.length; i++) {
      if (this.table.is_occupied(i)) yield this.table.value_of(i);
    }
  }

  /**
   * Remove entries as they are yielded, in ascending index order. Freed
   * indices join the free list in that order, so the last one yielded is
   * the next one handed out. Stopping early leaves the rest in place.
   */
  public *drain(): Generator<[LeaseKey, V], void, undefined> {
    for (let i = 0; i < this.table.length; i++) {
      if (this.table.is_occupied(i)) {
        const key = create_lease_key(i, this.table.generation_of(i));
        yield [key, this.release(i)];
      }
    }
  }

  public [Symbol.iterator](): IterableIterator<[LeaseKey, V]> {
    return this.entries();
  }

  //=========================================================
  // Inspection
  //=========================================================

  /** Tagged view of the slot at `index`, or undefined when out of range. */
  public slot(index: number): Slot<V> | undefined {
    return this.table.slot(index);
  }

  /** Vacant indices in the order they will be handed out. */
  public free_indices(): IterableIterator<number> {
    return this.free.indices();
  }

  //=========================================================
  // Internal
  //=========================================================

  /**
   * Index the key refers to, or UNASSIGNED. Three conditions must hold:
   *   1. The index is an integer inside the table.
   *   2. The slot is Occupied.
   *   3. The generation in the key matches the slot's.
   */
  private resolve(key: LeaseKey): number {
    const index = get_key_index(key);
    if (
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.table.length ||
      !this.table.is_occupied(index) ||
      this.table.generation_of(index) !== get_key_generation(key)
    ) {
      return UNASSIGNED;
    }
    return index;
  }

  private release(index: number): V {
    const value = this.table.vacate(index);
    if (!this.table.is_retired(index)) this.free.push(index);
    this.occupied_count--;
    return value;
  }
}
