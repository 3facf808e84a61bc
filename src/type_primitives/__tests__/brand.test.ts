import { describe, expect, it } from "vitest";
import type { Brand } from "../brand";

type Capacity = Brand<number, "capacity">;
type SlotIndex = Brand<number, "slot_index">;

describe("Brand", () => {
  it("branded value equals its underlying primitive at runtime", () => {
    const capacity = 16 as Capacity;
    expect(capacity).toBe(16);
  });

  it("branded values with same underlying value are equal at runtime", () => {
    const capacity = 7 as Capacity;
    const slot = 7 as SlotIndex;
    expect(capacity === (slot as unknown as Capacity)).toBe(true);
  });

  it("branded value can be used in arithmetic like a plain number", () => {
    const slot = 9 as SlotIndex;
    expect((slot + 1) % 10).toBe(0);
    expect(typeof slot).toBe("number");
  });
});
