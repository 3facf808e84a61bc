// Tables
export { ChainedTable } from "./chained/chained_table";
export {
  ProbingTable,
  type ProbingTableOptions,
} from "./probing/probing_table";
export {
  DUPLICATE_POLICY,
  type IntTable,
  type TableOptions,
  type TableStats,
} from "./table";

// Growth
export {
  FixedCapacityPolicy,
  LoadFactorPolicy,
  type GrowthPolicy,
} from "./growth/growth_policy";

// Operations
export {
  create_chained_table,
  create_probing_table,
  get_chaining,
  get_open_addressing,
  insert_chaining,
  insert_open_addressing,
  release_table,
} from "./operations";

// Hashing
export { hash_key, slot_index, type Capacity, type SlotIndex } from "./hash/hash";

// Allocation & errors
export { DEFAULT_ALLOCATOR, type SlotAllocator } from "./utils/allocation";
export { AppError, TABLE_ERROR, TableError, is_table_error } from "./utils/error";
export { DEFAULT_LOAD_FACTOR, GROWTH_FACTOR } from "./utils/constants";
