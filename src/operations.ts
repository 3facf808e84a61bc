/***
 * Operations — free-function surface over the two table layouts.
 *
 * Thin wrappers for callers that prefer a procedural API; every function
 * delegates to the table's own method and shares its error behaviour.
 * Lookups return undefined for a missing key, never a sentinel value.
 *
 ***/

import { ChainedTable } from "./chained/chained_table";
import {
  ProbingTable,
  type ProbingTableOptions,
} from "./probing/probing_table";
import type { IntTable, TableOptions } from "./table";

//=========================================================
// Separate chaining
//=========================================================

export function create_chained_table(
  capacity: number,
  options?: TableOptions,
): ChainedTable {
  return new ChainedTable(capacity, options);
}

/** Throws TableError(OUT_OF_MEMORY) when the entry cannot be allocated. */
export function insert_chaining(
  table: ChainedTable,
  key: number,
  value: number,
): void {
  table.insert(key, value);
}

export function get_chaining(
  table: ChainedTable,
  key: number,
): number | undefined {
  return table.get(key);
}

//=========================================================
// Open addressing
//=========================================================

export function create_probing_table(
  capacity: number,
  options?: ProbingTableOptions,
): ProbingTable {
  return new ProbingTable(capacity, options);
}

/**
 * May grow the table first. Throws TableError(OUT_OF_MEMORY) when the
 * grown storage cannot be allocated; the table is left unchanged.
 */
export function insert_open_addressing(
  table: ProbingTable,
  key: number,
  value: number,
): void {
  table.insert(key, value);
}

export function get_open_addressing(
  table: ProbingTable,
  key: number,
): number | undefined {
  return table.get(key);
}

//=========================================================
// Lifecycle
//=========================================================

export function release_table(table: IntTable): void {
  table.release();
}
