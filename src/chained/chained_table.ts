/***
 *
 * ChainedTable — fixed-capacity integer map with separate chaining
 *
 * Each slot heads a singly linked chain of entries. Entries live in an
 * arena of three parallel growable columns (keys, values, next); a link
 * is an arena row, NIL terminates a chain. Inserts prepend, so a chain
 * runs newest to oldest and a repeated key resolves to its latest value.
 *
 * Capacity never changes. A long chain costs lookups, not correctness.
 *
 * Memory layout:
 *   _heads:  Int32Array[capacity]   slot -> first row | NIL
 *   _keys:   f64[row]
 *   _values: f64[row]
 *   _next:   i32[row]               row -> next row in slot | NIL
 *
 ***/

import { slot_index, as_capacity, type Capacity } from "../hash/hash";
import {
  DUPLICATE_POLICY,
  assert_entry,
  assert_key,
  duplicate_key_error,
  ensure_alive,
  type IntTable,
  type TableOptions,
  type TableStats,
} from "../table";
import {
  is_non_negative_integer,
  unsafe_cast,
} from "../type_primitives/assertions";
import { GrowableTypedArray } from "../type_primitives/typed_arrays/typed_arrays";
import {
  DEFAULT_ALLOCATOR,
  allocate,
  type SlotAllocator,
} from "../utils/allocation";
import { NIL } from "../utils/constants";

export class ChainedTable implements IntTable {
  private _capacity: Capacity;
  private readonly _policy: DUPLICATE_POLICY;
  private readonly _allocator: SlotAllocator;

  private _heads: Int32Array;
  private readonly _keys: GrowableTypedArray<Float64Array>;
  private readonly _values: GrowableTypedArray<Float64Array>;
  private readonly _next: GrowableTypedArray<Int32Array>;
  private _released = false;

  constructor(capacity: number, options: TableOptions = {}) {
    this._capacity = as_capacity(capacity);
    this._policy = options.duplicate_policy ?? DUPLICATE_POLICY.KEEP;
    const allocator = (this._allocator = options.allocator ?? DEFAULT_ALLOCATOR);

    const context = { operation: "create", capacity };
    this._heads = allocate(() => allocator.i32(capacity).fill(NIL), context);
    this._keys = allocate(() => new GrowableTypedArray(allocator.f64), context);
    this._values = allocate(
      () => new GrowableTypedArray(allocator.f64),
      context,
    );
    this._next = allocate(() => new GrowableTypedArray(allocator.i32), context);
  }

  //=========================================================
  // Queries
  //=========================================================

  get size(): number {
    return this._keys.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  get released(): boolean {
    return this._released;
  }

  /**
   * Value of the newest entry for `key`, or undefined.
   * Walks the chain head to tail: at most chain-length comparisons.
   */
  get(key: number): number | undefined {
    ensure_alive(this._released, "get");
    assert_key(key);
    const row = this._find(key);
    return row === NIL ? undefined : this._values.get(row);
  }

  has(key: number): boolean {
    ensure_alive(this._released, "has");
    assert_key(key);
    return this._find(key) !== NIL;
  }

  slot_of(key: number): number | undefined {
    ensure_alive(this._released, "slot_of");
    assert_key(key);
    return this._find(key) === NIL
      ? undefined
      : slot_index(key, this._capacity);
  }

  /** Number of entries chained from `slot`; 0 outside [0, capacity). */
  chain_length(slot: number): number {
    ensure_alive(this._released, "chain_length");
    if (!is_non_negative_integer(slot) || slot >= this._capacity) return 0;
    let length = 0;
    for (let row = this._heads[slot]; row !== NIL; row = this._next.get(row)) {
      length++;
    }
    return length;
  }

  stats(): TableStats {
    ensure_alive(this._released, "stats");
    let longest = 0;
    for (let slot = 0; slot < this._capacity; slot++) {
      const length = this.chain_length(slot);
      if (length > longest) longest = length;
    }
    return {
      size: this.size,
      capacity: this._capacity,
      load: this.size / this._capacity,
      max_probe_length: longest,
    };
  }

  /** Visits entries slot by slot, each chain newest first. */
  for_each(fn: (key: number, value: number) => void): void {
    ensure_alive(this._released, "for_each");
    const heads = this._heads;
    for (let slot = 0; slot < heads.length; slot++) {
      for (let row = heads[slot]; row !== NIL; row = this._next.get(row)) {
        fn(this._keys.get(row), this._values.get(row));
      }
    }
  }

  [Symbol.iterator](): Iterator<[number, number]> {
    const entries: [number, number][] = [];
    this.for_each((key, value) => entries.push([key, value]));
    return entries[Symbol.iterator]();
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Prepend an entry to the key's chain.
   *
   * Arena room is reserved in all three columns before anything is
   * written, so an OUT_OF_MEMORY leaves size, heads and links as they were.
   */
  insert(key: number, value: number): void {
    ensure_alive(this._released, "insert");
    assert_entry(key, value);

    if (this._policy !== DUPLICATE_POLICY.KEEP) {
      const existing = this._find(key);
      if (existing !== NIL) {
        if (this._policy === DUPLICATE_POLICY.REJECT) {
          throw duplicate_key_error(key);
        }
        this._values.set_at(existing, value);
        return;
      }
    }

    const row = this._keys.length;
    allocate(
      () => {
        this._keys.ensure_capacity(row + 1);
        this._values.ensure_capacity(row + 1);
        this._next.ensure_capacity(row + 1);
      },
      { operation: "insert", key, size: row },
    );

    const slot = slot_index(key, this._capacity);
    this._keys.push(key);
    this._values.push(value);
    this._next.push(this._heads[slot]);
    this._heads[slot] = row;
  }

  /** Drop every chain and the slot array. Idempotent; size and capacity read 0 after. */
  release(): void {
    if (this._released) return;
    this._released = true;
    this._capacity = unsafe_cast<Capacity>(0);
    this._heads = this._allocator.i32(0);
    this._keys.release();
    this._values.release();
    this._next.release();
  }

  //=========================================================
  // Internal
  //=========================================================

  private _find(key: number): number {
    const slot = slot_index(key, this._capacity);
    for (let row = this._heads[slot]; row !== NIL; row = this._next.get(row)) {
      if (this._keys.get(row) === key) return row;
    }
    return NIL;
  }
}
