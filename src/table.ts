/***
 * Table — the surface shared by ChainedTable and ProbingTable.
 *
 * Both layouts map safe-integer keys to safe-integer values, report
 * absence as `undefined`, and are released as a unit.
 *
 ***/

import { assert, is_safe_integer } from "./type_primitives/assertions";
import type { SlotAllocator } from "./utils/allocation";
import { TABLE_ERROR, TableError } from "./utils/error";

export enum DUPLICATE_POLICY {
  /** Store a second entry; lookups follow the layout's tie-break. */
  KEEP = "KEEP",
  /** Replace the value of the entry a lookup would find. */
  OVERWRITE = "OVERWRITE",
  /** Throw TableError(DUPLICATE_KEY). */
  REJECT = "REJECT",
}

export interface TableOptions {
  duplicate_policy?: DUPLICATE_POLICY;
  allocator?: SlotAllocator;
}

export interface TableStats {
  size: number;
  capacity: number;
  /** size / capacity */
  load: number;
  /**
   * Most key comparisons a successful lookup can take: the longest
   * chain, or the longest distance from home slot plus one.
   */
  max_probe_length: number;
}

export interface IntTable extends Iterable<[number, number]> {
  readonly size: number;
  readonly capacity: number;
  readonly released: boolean;
  insert(key: number, value: number): void;
  get(key: number): number | undefined;
  has(key: number): boolean;
  /** Slot where get() finds `key`, or undefined when absent. */
  slot_of(key: number): number | undefined;
  stats(): TableStats;
  for_each(fn: (key: number, value: number) => void): void;
  release(): void;
}

export function assert_entry(key: number, value: number): void {
  assert(key, is_safe_integer, "key must be a safe integer");
  assert(value, is_safe_integer, "value must be a safe integer");
}

export function assert_key(key: number): void {
  assert(key, is_safe_integer, "key must be a safe integer");
}

export function ensure_alive(released: boolean, operation: string): void {
  if (released) {
    throw new TableError(
      TABLE_ERROR.TABLE_RELEASED,
      `Cannot ${operation} on a released table`,
      { operation },
    );
  }
}

export function duplicate_key_error(key: number): TableError {
  return new TableError(
    TABLE_ERROR.DUPLICATE_KEY,
    `Key ${key} is already present`,
    { key },
  );
}
