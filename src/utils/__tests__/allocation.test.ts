import { describe, expect, it } from "vitest";
import { DEFAULT_ALLOCATOR, allocate } from "../allocation";
import { TableError, TABLE_ERROR } from "../error";

describe("allocation", () => {
  //=========================================================
  // DEFAULT_ALLOCATOR
  //=========================================================

  it("allocates zeroed typed arrays of the requested length", () => {
    const f = DEFAULT_ALLOCATOR.f64(4);
    const i = DEFAULT_ALLOCATOR.i32(3);
    const u = DEFAULT_ALLOCATOR.u8(2);
    expect(f).toBeInstanceOf(Float64Array);
    expect(i).toBeInstanceOf(Int32Array);
    expect(u).toBeInstanceOf(Uint8Array);
    expect(Array.from(f)).toEqual([0, 0, 0, 0]);
    expect(i.length).toBe(3);
    expect(u.length).toBe(2);
  });

  //=========================================================
  // allocate
  //=========================================================

  it("returns the result of the callback", () => {
    expect(allocate(() => 42, { operation: "test" })).toBe(42);
  });

  it("translates RangeError into OUT_OF_MEMORY", () => {
    const cause = new RangeError("Array buffer allocation failed");
    let caught: unknown;
    try {
      allocate(
        () => {
          throw cause;
        },
        { operation: "grow", capacity: 8 },
      );
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TableError);
    if (!(caught instanceof TableError)) return;
    expect(caught.category).toBe(TABLE_ERROR.OUT_OF_MEMORY);
    expect(caught.message).toBe(
      "Allocation failed: Array buffer allocation failed",
    );
    expect(caught.context).toEqual({ operation: "grow", capacity: 8, cause });
  });

  it("rethrows other errors untouched", () => {
    const err = new Error("boom");
    expect(() =>
      allocate(() => {
        throw err;
      }, {}),
    ).toThrow(err);
  });
});
