/***
 * GrowableTypedArray — TypedArray wrapper with amortised O(1) append.
 *
 * TypedArrays have fixed length; resizing requires allocating a new
 * buffer and copying. GrowableTypedArray wraps one with a separate
 * logical length and doubles the backing buffer on overflow.
 *
 * Buffers come from an allocation function rather than a constructor,
 * so callers can route every allocation through a SlotAllocator.
 * A failed grow leaves the old buffer and length in place.
 *
 ***/

import {
  DEFAULT_INITIAL_CAPACITY,
  GROWTH_FACTOR,
} from "../../utils/constants";

export type AnyTypedArray = Float64Array | Int32Array | Uint8Array;

export class GrowableTypedArray<T extends AnyTypedArray> {
  private _buf: T;
  private _len = 0;

  constructor(
    private readonly _alloc: (length: number) => T,
    initial_capacity = DEFAULT_INITIAL_CAPACITY,
  ) {
    this._buf = _alloc(initial_capacity);
  }

  public get length(): number {
    return this._len;
  }

  /** Size of the backing buffer. */
  public get capacity(): number {
    return this._buf.length;
  }

  public push(value: number): void {
    if (this._len >= this._buf.length) this.ensure_capacity(this._len + 1);
    this._buf[this._len++] = value;
  }

  public get(i: number): number {
    return this._buf[i];
  }

  public set_at(i: number, value: number): void {
    this._buf[i] = value;
  }

  public clear(): void {
    this._len = 0;
  }

  /** Drop the backing buffer. The array is empty afterwards. */
  public release(): void {
    this._buf = this._alloc(0);
    this._len = 0;
  }

  /**
   * Raw backing buffer. Valid data: indices 0..length-1.
   * This reference is stable until the next push() that triggers a grow.
   */
  public get buf(): T {
    return this._buf;
  }

  [Symbol.iterator](): Iterator<number> {
    let i = 0;
    const buf = this._buf;
    const len = this._len;
    return {
      next(): IteratorResult<number> {
        if (i < len) return { value: buf[i++], done: false };
        return { value: 0, done: true };
      },
    };
  }

  /** Ensure the backing buffer can hold at least `capacity` elements without growing. */
  public ensure_capacity(capacity: number): void {
    if (capacity <= this._buf.length) return;
    let new_cap = this._buf.length || 1;
    while (new_cap < capacity) new_cap *= GROWTH_FACTOR;
    const next = this._alloc(new_cap);
    next.set(this._buf.subarray(0, this._len));
    this._buf = next;
  }
}
