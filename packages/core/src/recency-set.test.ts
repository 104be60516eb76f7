import { describe, expect, it } from "vitest";
import { RecencySet } from "./recency-set.js";

describe("RecencySet", () => {
  it("never grows past its capacity and keeps the newest ids", () => {
    const set = new RecencySet(3);
    for (const id of ["a", "b", "c", "d", "e"]) {
      set.add(id);
    }

    expect(set.size).toBe(3);
    expect(["c", "d", "e"].map((id) => set.has(id))).toEqual([true, true, true]);
    expect(set.has("a")).toBe(false);
    expect(set.has("b")).toBe(false);
  });

  it("holds the last C distinct ids across long insertion runs", () => {
    for (const capacity of [1, 2, 7, 50]) {
      const set = new RecencySet(capacity);
      const ids = Array.from({ length: capacity * 3 + 1 }, (_, index) => `id-${index}`);
      ids.forEach((id) => set.add(id));

      expect(set.size).toBe(capacity);
      for (const id of ids.slice(-capacity)) {
        expect(set.has(id)).toBe(true);
      }
    }
  });

  it("treats re-adding a present id as a no-op that does not refresh it", () => {
    const set = new RecencySet(2);
    set.add("a");
    set.add("b");
    set.add("a");
    set.add("c");

    expect(set.size).toBe(2);
    expect(set.has("a")).toBe(false);
    expect(set.has("b")).toBe(true);
    expect(set.has("c")).toBe(true);
  });

  it("rejects capacities that are not positive integers", () => {
    expect(() => new RecencySet(0)).toThrow(RangeError);
    expect(() => new RecencySet(1.5)).toThrow(RangeError);
  });
});
