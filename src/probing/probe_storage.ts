/***
 * ProbeStorage — fixed-length slot columns for linear probing.
 *
 * One row per slot: key, value, and an occupancy byte. A slot only ever
 * moves EMPTY_SLOT -> OCCUPIED_SLOT. Storage has no size counter; the
 * owning table keeps one.
 *
 * Both scans stop after `capacity` probes at most: an empty slot ends
 * the probe sequence, and returning to the origin means every slot has
 * been visited.
 *
 ***/

import {
  next_slot,
  slot_index,
  type Capacity,
  type SlotIndex,
} from "../hash/hash";
import { unsafe_cast } from "../type_primitives/assertions";
import { allocate, type SlotAllocator } from "../utils/allocation";
import { EMPTY_SLOT, NIL, OCCUPIED_SLOT } from "../utils/constants";
import { TABLE_ERROR, TableError } from "../utils/error";

export interface ProbeStorage {
  readonly capacity: Capacity;
  readonly keys: Float64Array;
  readonly values: Float64Array;
  readonly occupied: Uint8Array;
}

/** Zero-slot stand-in held by a released table. */
export const RELEASED_STORAGE: ProbeStorage = Object.freeze({
  capacity: unsafe_cast<Capacity>(0),
  keys: new Float64Array(0),
  values: new Float64Array(0),
  occupied: new Uint8Array(0),
});

export function create_probe_storage(
  capacity: Capacity,
  allocator: SlotAllocator,
): ProbeStorage {
  return allocate(
    () => ({
      capacity,
      keys: allocator.f64(capacity),
      values: allocator.f64(capacity),
      occupied: allocator.u8(capacity).fill(EMPTY_SLOT),
    }),
    { operation: "allocate_slots", capacity },
  );
}

/**
 * Slot holding the first entry for `key` along its probe sequence,
 * or NIL.
 */
export function probe_find(storage: ProbeStorage, key: number): number {
  const { capacity, keys, occupied } = storage;
  const origin = slot_index(key, capacity);
  let index = origin;
  while (occupied[index] === OCCUPIED_SLOT) {
    if (keys[index] === key) return index;
    index = next_slot(index, capacity);
    if (index === origin) break; // full circle
  }
  return NIL;
}

/**
 * Write the entry into the first empty slot on its probe sequence.
 * Throws TABLE_FULL instead of wrapping past the origin.
 */
export function probe_place(
  storage: ProbeStorage,
  key: number,
  value: number,
): SlotIndex {
  const { capacity, keys, values, occupied } = storage;
  const origin = slot_index(key, capacity);
  let index = origin;
  while (occupied[index] === OCCUPIED_SLOT) {
    index = next_slot(index, capacity);
    if (index === origin) {
      throw new TableError(
        TABLE_ERROR.TABLE_FULL,
        `No empty slot for key ${key} in a table of capacity ${capacity}`,
        { key, capacity },
      );
    }
  }
  keys[index] = key;
  values[index] = value;
  occupied[index] = OCCUPIED_SLOT;
  return index;
}

/** Steps from the key's home slot to `slot`, following wraparound. */
export function probe_distance(storage: ProbeStorage, slot: number): number {
  const home = slot_index(storage.keys[slot], storage.capacity);
  return (slot - home + storage.capacity) % storage.capacity;
}

/** Index of some empty slot, or NIL when every slot is occupied. */
export function find_vacant_slot(storage: ProbeStorage): number {
  return storage.occupied.indexOf(EMPTY_SLOT);
}
