/***
 * Hash — key to slot mapping shared by both table layouts.
 *
 * hash_key is the plain remainder `key % capacity`. JavaScript's `%`
 * truncates toward zero, so the remainder takes the sign of the key:
 * hash_key(-7, 10) === -7 and hash_key(-10, 10) === -0. There is no
 * mixing step; sequential or patterned keys cluster accordingly.
 *
 * slot_index folds that remainder into [0, capacity) and is the only
 * index the tables ever use. For non-negative keys the two agree.
 *
 ***/

import type { Brand } from "../type_primitives/brand";
import {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "../type_primitives/assertions";
import { TABLE_ERROR, TableError } from "../utils/error";

export type Capacity = Brand<number, "capacity">;
export type SlotIndex = Brand<number, "slot_index">;

/**
 * Checked capacity. Unlike key checks this is not dev-only: every hash
 * against a zero capacity is NaN.
 */
export function as_capacity(capacity: number): Capacity {
  if (!is_positive_integer(capacity)) {
    throw new TableError(
      TABLE_ERROR.INVALID_CAPACITY,
      `Capacity must be a positive safe integer, got ${capacity}`,
      { capacity },
    );
  }
  return unsafe_cast<Capacity>(capacity);
}

export function hash_key(key: number, capacity: number): number {
  return key % capacity;
}

export function slot_index(key: number, capacity: Capacity): SlotIndex {
  const index = (hash_key(key, capacity) + capacity) % capacity;
  return validate_and_cast<number, SlotIndex>(
    index,
    (i) => is_non_negative_integer(i) && i < capacity,
    `slot index within [0, ${capacity})`,
  );
}

/** Linear probe step with wraparound. */
export function next_slot(index: SlotIndex, capacity: Capacity): SlotIndex {
  return unsafe_cast<SlotIndex>((index + 1) % capacity);
}
