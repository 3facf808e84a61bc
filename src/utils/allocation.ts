/***
 * Allocation — typed-array factories and out-of-memory translation.
 *
 * Every buffer a table owns is created through a SlotAllocator, so a
 * test (or an embedder with a memory budget) can substitute its own.
 * Engines report a failed buffer allocation as a RangeError; allocate()
 * turns that into TableError(OUT_OF_MEMORY) and leaves any other error
 * untouched.
 *
 ***/

import { TABLE_ERROR, TableError } from "./error";

export interface SlotAllocator {
  f64(length: number): Float64Array;
  i32(length: number): Int32Array;
  u8(length: number): Uint8Array;
}

export const DEFAULT_ALLOCATOR: SlotAllocator = Object.freeze({
  f64: (length: number) => new Float64Array(length),
  i32: (length: number) => new Int32Array(length),
  u8: (length: number) => new Uint8Array(length),
});

/**
 * Run `fn`, reporting a RangeError as OUT_OF_MEMORY.
 * `context` should describe the attempted operation; the original
 * error is attached as `context.cause`.
 */
export function allocate<T>(fn: () => T, context: Record<string, unknown>): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof RangeError) {
      throw new TableError(
        TABLE_ERROR.OUT_OF_MEMORY,
        `Allocation failed: ${err.message}`,
        { ...context, cause: err },
      );
    }
    throw err;
  }
}
