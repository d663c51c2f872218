/***
 * Slot — one storage unit of the slot table, Occupied or Vacant.
 *
 * The table stores slots column-wise; this union is the materialised
 * view handed out for inspection. A Vacant slot carries the next link
 * of the free list it is threaded on.
 *
 ***/

export enum SLOT {
  OCCUPIED = "OCCUPIED",
  VACANT = "VACANT",
}

export interface OccupiedSlot<V> {
  readonly tag: SLOT.OCCUPIED;
  readonly generation: number;
  readonly value: V;
  readonly inserted_at: number;
}

export interface VacantSlot {
  readonly tag: SLOT.VACANT;
  readonly generation: number;
  /** Next free index, END_OF_FREE_LIST, or RETIRED_LINK for a spent slot. */
  readonly next_free: number;
}

export type Slot<V> = OccupiedSlot<V> | VacantSlot;

export const is_occupied_slot = <V>(slot: Slot<V>): slot is OccupiedSlot<V> =>
  slot.tag === SLOT.OCCUPIED;
