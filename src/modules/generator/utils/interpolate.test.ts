import { describe, expect, it } from "vitest";
import { interpolate } from "./interpolate";

describe("interpolate", () => {
  it("returns x at alpha 0 and y at alpha 1", () => {
    const pairs: Array<[number, number]> = [
      [0.1, 0.9],
      [-3, 7.5],
      [1e6, -1e-6],
      [0, 0],
    ];
    for (const [x, y] of pairs) {
      expect(interpolate(x, y, 0)).toBe(x);
      expect(interpolate(x, y, 1)).toBe(y);
    }
  });

  it("blends linearly in between", () => {
    expect(interpolate(0, 8, 0.5)).toBe(4);
    expect(interpolate(2, 10, 0.25)).toBe(4);
  });

  it("does not clamp alpha", () => {
    expect(interpolate(0, 4, 2)).toBe(8);
  });
});
