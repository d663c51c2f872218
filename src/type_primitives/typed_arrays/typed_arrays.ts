/***
 * GrowableTypedArray — TypedArray wrapper with amortised O(1) append.
 *
 * TypedArrays have fixed length — resizing requires allocating a new
 * buffer and copying. GrowableTypedArray wraps one with a separate
 * logical length and doubles the backing buffer on overflow.
 *
 * The slot table keeps one of these per column: generations in a
 * GrowableUint32Array, free-list links and lease timestamps in
 * GrowableFloat64Array (links must hold indices above 2^31).
 *
 ***/

import {
  DEFAULT_INITIAL_CAPACITY,
  GROWTH_FACTOR,
} from "../../utils/constants";

export type AnyTypedArray = Float64Array | Uint32Array;

export class GrowableTypedArray<T extends AnyTypedArray> {
  private _buf: T;
  private _len = 0;

  constructor(
    private readonly _ctor: new (n: number) => T,
    initial_capacity = DEFAULT_INITIAL_CAPACITY,
  ) {
    this._buf = new _ctor(initial_capacity);
  }

  public get length(): number {
    return this._len;
  }

  /** Size of the backing buffer. */
  public get capacity(): number {
    return this._buf.length;
  }

  public push(value: number): void {
    if (this._len >= this._buf.length) this._grow();
    this._buf[this._len++] = value;
  }

  public get(i: number): number {
    return this._buf[i];
  }

  public set_at(i: number, value: number): void {
    this._buf[i] = value;
  }

  /** Ensure the backing buffer can hold at least `capacity` elements without growing. */
  public ensure_capacity(capacity: number): void {
    if (capacity <= this._buf.length) return;
    let new_cap = this._buf.length || 1;
    while (new_cap < capacity) new_cap *= GROWTH_FACTOR;
    this._reallocate(new_cap);
  }

  private _grow(): void {
    this._reallocate((this._buf.length || 1) * GROWTH_FACTOR);
  }

  private _reallocate(new_cap: number): void {
    const next = new this._ctor(new_cap);
    next.set(this._buf.subarray(0, this._len));
    this._buf = next;
  }
}

export class GrowableFloat64Array extends GrowableTypedArray<Float64Array> {
  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    super(Float64Array, initial_capacity);
  }
}

export class GrowableUint32Array extends GrowableTypedArray<Uint32Array> {
  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    super(Uint32Array, initial_capacity);
  }
}
