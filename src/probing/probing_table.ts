/***
 *
 * ProbingTable — integer map with linear-probing open addressing
 *
 * Each slot holds at most one entry. A colliding entry goes to the next
 * empty slot, wrapping at the end of the table. The growth policy is
 * consulted before every placement; growing rehashes into fresh storage
 * and swaps it in with a single assignment, so the table object a caller
 * holds stays valid and never exposes a half-built state.
 *
 * Under DUPLICATE_POLICY.KEEP a repeated key is placed further along the
 * same probe sequence, and lookups return the earliest inserted value.
 *
 ***/

import { as_capacity } from "../hash/hash";
import { LoadFactorPolicy, type GrowthPolicy } from "../growth/growth_policy";
import { rehash } from "../growth/rehash";
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
import { DEFAULT_ALLOCATOR, type SlotAllocator } from "../utils/allocation";
import { NIL, OCCUPIED_SLOT } from "../utils/constants";
import { TABLE_ERROR, TableError } from "../utils/error";
import {
  create_probe_storage,
  probe_distance,
  probe_find,
  probe_place,
  RELEASED_STORAGE,
  type ProbeStorage,
} from "./probe_storage";

export interface ProbingTableOptions extends TableOptions {
  /** Defaults to a LoadFactorPolicy at 0.7, doubling. */
  growth?: GrowthPolicy;
}

export class ProbingTable implements IntTable {
  private readonly _policy: DUPLICATE_POLICY;
  private readonly _growth: GrowthPolicy;
  private readonly _allocator: SlotAllocator;

  private _storage: ProbeStorage;
  private _size = 0;
  private _released = false;

  constructor(capacity: number, options: ProbingTableOptions = {}) {
    this._policy = options.duplicate_policy ?? DUPLICATE_POLICY.KEEP;
    this._growth = options.growth ?? new LoadFactorPolicy();
    this._allocator = options.allocator ?? DEFAULT_ALLOCATOR;
    this._storage = create_probe_storage(
      as_capacity(capacity),
      this._allocator,
    );
  }

  //=========================================================
  // Queries
  //=========================================================

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._storage.capacity;
  }

  get released(): boolean {
    return this._released;
  }

  /**
   * Value stored for `key`, or undefined.
   *
   * Stops at the first empty slot, or after visiting every slot once
   * when the table has none.
   */
  get(key: number): number | undefined {
    ensure_alive(this._released, "get");
    assert_key(key);
    const slot = probe_find(this._storage, key);
    return slot === NIL ? undefined : this._storage.values[slot];
  }

  has(key: number): boolean {
    ensure_alive(this._released, "has");
    assert_key(key);
    return probe_find(this._storage, key) !== NIL;
  }

  slot_of(key: number): number | undefined {
    ensure_alive(this._released, "slot_of");
    assert_key(key);
    const slot = probe_find(this._storage, key);
    return slot === NIL ? undefined : slot;
  }

  /** Key held by `slot`, or undefined when the slot is empty. */
  key_at(slot: number): number | undefined {
    ensure_alive(this._released, "key_at");
    const { occupied, keys } = this._storage;
    return occupied[slot] === OCCUPIED_SLOT ? keys[slot] : undefined;
  }

  stats(): TableStats {
    ensure_alive(this._released, "stats");
    const storage = this._storage;
    let longest = 0;
    for (let slot = 0; slot < storage.capacity; slot++) {
      if (storage.occupied[slot] !== OCCUPIED_SLOT) continue;
      const length = probe_distance(storage, slot) + 1;
      if (length > longest) longest = length;
    }
    return {
      size: this._size,
      capacity: storage.capacity,
      load: this._size / storage.capacity,
      max_probe_length: longest,
    };
  }

  /** Visits occupied slots in index order. */
  for_each(fn: (key: number, value: number) => void): void {
    ensure_alive(this._released, "for_each");
    const { capacity, occupied, keys, values } = this._storage;
    for (let slot = 0; slot < capacity; slot++) {
      if (occupied[slot] === OCCUPIED_SLOT) fn(keys[slot], values[slot]);
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
   * Place an entry, growing first when the policy asks for it.
   *
   * Duplicate checks run before growth, so a rejected insert leaves
   * capacity untouched as well as size.
   */
  insert(key: number, value: number): void {
    ensure_alive(this._released, "insert");
    assert_entry(key, value);

    if (this._policy !== DUPLICATE_POLICY.KEEP) {
      const existing = probe_find(this._storage, key);
      if (existing !== NIL) {
        if (this._policy === DUPLICATE_POLICY.REJECT) {
          throw duplicate_key_error(key);
        }
        this._storage.values[existing] = value;
        return;
      }
    }

    if (this._growth.should_grow(this._size, this._storage.capacity)) {
      this._grow();
    }
    probe_place(this._storage, key, value);
    this._size++;
  }

  /** Drop the slot columns. Idempotent; size and capacity read 0 after. */
  release(): void {
    if (this._released) return;
    this._released = true;
    this._storage = RELEASED_STORAGE;
    this._size = 0;
  }

  //=========================================================
  // Internal
  //=========================================================

  private _grow(): void {
    const capacity = this._storage.capacity;
    const next_capacity = this._growth.next_capacity(capacity);
    if (!Number.isSafeInteger(next_capacity) || next_capacity <= capacity) {
      throw new TableError(
        TABLE_ERROR.INVALID_OPTION,
        `Growth policy must return a larger integer capacity, got ${next_capacity} for ${capacity}`,
        { capacity, next_capacity },
      );
    }
    this._storage = rehash(this._storage, next_capacity, this._allocator);
  }
}
