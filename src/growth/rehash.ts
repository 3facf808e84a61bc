/***
 * Rehash — redistribute every entry of a probing table into new storage.
 *
 * The old storage is only read. The caller swaps the result in once it
 * is complete, so an allocation or placement failure leaves the table
 * exactly as it was.
 *
 * Slots are visited starting just past an empty slot and wrapping
 * around. Every cluster is then re-placed in its original probe order,
 * so of two entries sharing a key the earlier one still comes first.
 *
 ***/

import { as_capacity } from "../hash/hash";
import {
  create_probe_storage,
  find_vacant_slot,
  probe_place,
  type ProbeStorage,
} from "../probing/probe_storage";
import type { SlotAllocator } from "../utils/allocation";
import { NIL, OCCUPIED_SLOT } from "../utils/constants";

export function rehash(
  old: ProbeStorage,
  capacity: number,
  allocator: SlotAllocator,
): ProbeStorage {
  const next = create_probe_storage(as_capacity(capacity), allocator);
  const vacant = find_vacant_slot(old);
  const start = vacant === NIL ? 0 : vacant + 1;

  for (let i = 0; i < old.capacity; i++) {
    const slot = (start + i) % old.capacity;
    if (old.occupied[slot] !== OCCUPIED_SLOT) continue;
    probe_place(next, old.keys[slot], old.values[slot]);
  }
  return next;
}
