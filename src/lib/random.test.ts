import { describe, expect, it } from "vitest";
import { sample, seededRng } from "./random.js";

describe("seededRng", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = seededRng(42);
    const b = seededRng(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    expect(seededRng(1)()).not.toBe(seededRng(2)());
  });
});

describe("sample", () => {
  it("does not modify its input", () => {
    const items = [1, 2, 3, 4];
    const picked = sample(items, 2, seededRng(9));
    expect(items).toEqual([1, 2, 3, 4]);
    expect(picked).toHaveLength(2);
    expect(new Set(picked).size).toBe(2);
  });

  it("takes the first item when the generator returns 0", () => {
    expect(sample(["a", "b", "c"], 1, () => 0)).toEqual(["a"]);
    expect(sample(["a", "b", "c"], 1, () => 0.99)).toEqual(["c"]);
  });

  it("handles zero and negative sizes", () => {
    expect(sample([1, 2], 0)).toEqual([]);
    expect(sample([1, 2], -1)).toEqual([]);
  });
});
