import { describe, expect, it } from "vitest";
import {
  create_chained_table,
  create_probing_table,
  get_chaining,
  get_open_addressing,
  insert_chaining,
  insert_open_addressing,
  release_table,
} from "../operations";
import { DUPLICATE_POLICY } from "../table";
import { TableError, TABLE_ERROR } from "../utils/error";

describe("operations", () => {
  //=========================================================
  // chaining
  //=========================================================

  it("chaining: inserts and looks up colliding keys", () => {
    const table = create_chained_table(10);
    insert_chaining(table, 10, 100);
    insert_chaining(table, 20, 200);
    insert_chaining(table, 30, 300);
    expect(get_chaining(table, 20)).toBe(200);
    expect(get_chaining(table, 99)).toBeUndefined();
  });

  it("chaining: a repeated key resolves to the latest value", () => {
    const table = create_chained_table(10);
    insert_chaining(table, 42, 1);
    insert_chaining(table, 42, 2);
    expect(get_chaining(table, 42)).toBe(2);
  });

  it("chaining: options reach the table", () => {
    const table = create_chained_table(10, {
      duplicate_policy: DUPLICATE_POLICY.OVERWRITE,
    });
    insert_chaining(table, 42, 1);
    insert_chaining(table, 42, 2);
    expect(table.size).toBe(1);
  });

  //=========================================================
  // open addressing
  //=========================================================

  it("open addressing: collisions land on consecutive slots", () => {
    const table = create_probing_table(10);
    insert_open_addressing(table, 15, 150);
    insert_open_addressing(table, 25, 250);
    insert_open_addressing(table, 35, 350);
    expect(get_open_addressing(table, 25)).toBe(250);
    expect(table.slot_of(15)).toBe(5);
    expect(table.slot_of(25)).toBe(6);
    expect(table.slot_of(35)).toBe(7);
  });

  it("open addressing: a miss below the threshold stays bounded", () => {
    const table = create_probing_table(10);
    for (let k = 0; k < 6; k++) insert_open_addressing(table, k * 10 + 5, k);
    expect(table.capacity).toBe(10);
    expect(get_open_addressing(table, 1000)).toBeUndefined();
    expect(get_open_addressing(table, 75)).toBeUndefined();
  });

  it("open addressing: the table handle survives growth", () => {
    const table = create_probing_table(2);
    for (let k = 0; k < 50; k++) insert_open_addressing(table, k, k * k);
    expect(table.size).toBe(50);
    expect(table.capacity).toBe(128);
    for (let k = 0; k < 50; k++) {
      expect(get_open_addressing(table, k)).toBe(k * k);
    }
  });

  //=========================================================
  // release
  //=========================================================

  it("release_table works for both layouts", () => {
    const chained = create_chained_table(4);
    const probing = create_probing_table(4);
    release_table(chained);
    release_table(probing);
    expect(chained.released).toBe(true);
    expect(probing.released).toBe(true);
    expect(() => get_chaining(chained, 1)).toThrow(TableError);
    try {
      get_open_addressing(probing, 1);
    } catch (e) {
      expect(e instanceof TableError && e.category).toBe(
        TABLE_ERROR.TABLE_RELEASED,
      );
    }
  });
});
