import { describe, it, expect } from "vitest";
import { insertionIndex, indexOfSorted, withInserted, withoutIndex } from "./sorted";

const byValue = (a: number, b: number) => a - b;

describe("insertionIndex", () => {
  it("places equal elements after existing ones", () => {
    expect(insertionIndex([1, 2, 2, 3], 2, byValue)).toBe(3);
  });

  it("handles both ends and empty arrays", () => {
    expect(insertionIndex([1, 2, 3], 0, byValue)).toBe(0);
    expect(insertionIndex([1, 2, 3], 4, byValue)).toBe(3);
    expect(insertionIndex([], 4, byValue)).toBe(0);
  });
});

describe("indexOfSorted", () => {
  it("finds present elements", () => {
    expect(indexOfSorted([1, 2, 3], 2, byValue)).toBe(1);
    expect(indexOfSorted([1, 2, 3], 3, byValue)).toBe(2);
  });

  it("returns -1 for missing elements", () => {
    expect(indexOfSorted([1, 3], 2, byValue)).toBe(-1);
    expect(indexOfSorted([1, 3], 0, byValue)).toBe(-1);
    expect(indexOfSorted([], 1, byValue)).toBe(-1);
  });
});

describe("copy-on-write helpers", () => {
  it("inserts into a copy", () => {
    const items = [1, 3, 5];
    const next = withInserted(items, 4, byValue);

    expect(next).toEqual([1, 3, 4, 5]);
    expect(items).toEqual([1, 3, 5]);
  });

  it("removes from a copy", () => {
    const items = [1, 3, 5];
    const next = withoutIndex(items, 1);

    expect(next).toEqual([1, 5]);
    expect(items).toEqual([1, 3, 5]);
  });
});
