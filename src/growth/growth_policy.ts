/***
 *
 * GrowthPolicy — when a probing table grows, and to what capacity.
 *
 * ProbingTable asks should_grow() before every placement, so the check
 * sees the size the table has before the new entry lands.
 *
 * LoadFactorPolicy grows once size reaches `load_factor * capacity`,
 * and also whenever the next entry would fill the last empty slot. The
 * second rule only matters for tiny capacities (1 or 2 slots at the
 * default 0.7) and keeps at least one slot empty after every insert.
 *
 * FixedCapacityPolicy never grows; a full table then rejects inserts
 * with TABLE_FULL.
 *
 ***/

import { DEFAULT_LOAD_FACTOR, GROWTH_FACTOR } from "../utils/constants";
import { TABLE_ERROR, TableError } from "../utils/error";

export interface GrowthPolicy {
  should_grow(size: number, capacity: number): boolean;
  /** Must return an integer greater than `capacity`. */
  next_capacity(capacity: number): number;
}

export class LoadFactorPolicy implements GrowthPolicy {
  constructor(
    public readonly load_factor = DEFAULT_LOAD_FACTOR,
    public readonly growth_factor = GROWTH_FACTOR,
  ) {
    if (!(load_factor > 0 && load_factor <= 1)) {
      throw new TableError(
        TABLE_ERROR.INVALID_OPTION,
        `load_factor must be in (0, 1], got ${load_factor}`,
        { load_factor },
      );
    }
    if (!(growth_factor > 1) || !Number.isFinite(growth_factor)) {
      throw new TableError(
        TABLE_ERROR.INVALID_OPTION,
        `growth_factor must be a finite number above 1, got ${growth_factor}`,
        { growth_factor },
      );
    }
  }

  should_grow(size: number, capacity: number): boolean {
    return size >= this.load_factor * capacity || size + 1 >= capacity;
  }

  next_capacity(capacity: number): number {
    return Math.max(capacity + 1, Math.ceil(capacity * this.growth_factor));
  }
}

export class FixedCapacityPolicy implements GrowthPolicy {
  should_grow(): boolean {
    return false;
  }

  next_capacity(capacity: number): number {
    return capacity;
  }
}
