import { describe, expect, it } from "vitest";
import { GrowableTypedArray } from "../typed_arrays";

const f64 = (length: number) => new Float64Array(length);
const i32 = (length: number) => new Int32Array(length);

describe("GrowableTypedArray", () => {
  //=========================================================
  // push / get / length
  //=========================================================

  it("starts empty with the requested backing capacity", () => {
    const a = new GrowableTypedArray(f64, 4);
    expect(a.length).toBe(0);
    expect(a.capacity).toBe(4);
  });

  it("push increments length and stores values", () => {
    const a = new GrowableTypedArray(f64);
    a.push(1);
    a.push(-2);
    a.push(2 ** 40);
    expect(a.length).toBe(3);
    expect(a.get(0)).toBe(1);
    expect(a.get(1)).toBe(-2);
    expect(a.get(2)).toBe(2 ** 40);
  });

  it("set_at overwrites value at index", () => {
    const a = new GrowableTypedArray(i32);
    a.push(1);
    a.push(2);
    a.set_at(0, 99);
    expect([...a]).toEqual([99, 2]);
  });

  //=========================================================
  // growth
  //=========================================================

  it("doubles the backing buffer on overflow and keeps data", () => {
    const a = new GrowableTypedArray(i32, 2);
    a.push(10);
    a.push(20);
    a.push(30);
    expect(a.capacity).toBe(4);
    expect([...a]).toEqual([10, 20, 30]);
  });

  it("grows from a zero-length buffer", () => {
    const a = new GrowableTypedArray(i32, 0);
    a.push(7);
    expect(a.capacity).toBe(1);
    expect(a.get(0)).toBe(7);
  });

  it("ensure_capacity is a no-op when already large enough", () => {
    const a = new GrowableTypedArray(f64, 8);
    const before = a.buf;
    a.ensure_capacity(8);
    expect(a.buf).toBe(before);
  });

  it("ensure_capacity rounds up by doubling", () => {
    const a = new GrowableTypedArray(f64, 3);
    a.ensure_capacity(10);
    expect(a.capacity).toBe(12);
    expect(a.length).toBe(0);
  });

  it("a failed grow leaves buffer and length in place", () => {
    let allow = true;
    const a = new GrowableTypedArray((length: number) => {
      if (!allow) throw new RangeError("Array buffer allocation failed");
      return new Int32Array(length);
    }, 1);
    a.push(5);
    allow = false;
    expect(() => a.push(6)).toThrow(RangeError);
    expect(a.length).toBe(1);
    expect(a.capacity).toBe(1);
    expect(a.get(0)).toBe(5);
  });

  //=========================================================
  // clear / release
  //=========================================================

  it("clear resets length but keeps the buffer", () => {
    const a = new GrowableTypedArray(f64, 4);
    a.push(1);
    a.clear();
    expect(a.length).toBe(0);
    expect(a.capacity).toBe(4);
  });

  it("release drops the buffer", () => {
    const a = new GrowableTypedArray(f64, 4);
    a.push(1);
    a.release();
    expect(a.length).toBe(0);
    expect(a.capacity).toBe(0);
    expect([...a]).toEqual([]);
  });
});
