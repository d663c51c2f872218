/***
 *
 * FreeList — LIFO chain of vacant slot indices.
 *
 * The chain lives inside the slot table's link column: each Vacant slot
 * stores the index of the next vacant slot, and only the head is held
 * here. Push and pop are O(1) and allocate nothing.
 *
 * The most recently vacated slot is always the next one handed out.
 *
 ***/

import { END_OF_FREE_LIST } from "../utils/constants";

/** Link column the chain is threaded through (SlotTable implements it). */
export interface FreeLinks {
  link_of(index: number): number;
  set_link(index: number, link: number): void;
}

export class FreeList {
  private _head: number = END_OF_FREE_LIST;

  constructor(private readonly table: FreeLinks) {}

  /** Index at the head of the chain, or END_OF_FREE_LIST. */
  public get head(): number {
    return this._head;
  }

  public get is_empty(): boolean {
    return this._head === END_OF_FREE_LIST;
  }

  public push(index: number): void {
    this.table.set_link(index, this._head);
    this._head = index;
  }

  /** Take the head index, or undefined when the table must grow. */
  public pop(): number | undefined {
    if (this._head === END_OF_FREE_LIST) return undefined;
    const index = this._head;
    this._head = this.table.link_of(index);
    return index;
  }

  /**
   * Thread the fresh run [from, to) so that it pops in ascending order.
   * Pushes from the top down, leaving `from` at the head.
   */
  public thread_fresh(from: number, to: number): void {
    for (let i = to - 1; i >= from; i--) this.push(i);
  }

  /** Walk the chain from the head. */
  public *indices(): IterableIterator<number> {
    for (let i = this._head; i !== END_OF_FREE_LIST; i = this.table.link_of(i)) {
      yield i;
    }
  }
}
