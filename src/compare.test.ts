import { describe, expect, it } from "vitest";
import { codeThreshold, compare, heightThreshold } from "./compare";
import { Comparison } from "./types";

describe("thresholds", () => {
  it("scales code bands to twentieths", () => {
    // near 5 + 10 = 15, far 50 + 35 = 85
    expect(codeThreshold(100)).toEqual({ near: 300, far: 1700 });
    expect(codeThreshold(0)).toEqual({ near: 100, far: 1000 });
  });

  it("widens height bands away from 168", () => {
    expect(heightThreshold(168)).toEqual({ near: 60, far: 300 });
    // d = 8: near 3.8, far 17.8
    expect(heightThreshold(160)).toEqual({ near: 76, far: 356 });
    expect(heightThreshold(176)).toEqual(heightThreshold(160));
  });
});

describe("compare", () => {
  const code100 = codeThreshold(100);

  it("is correct only on equality", () => {
    expect(compare(code100, 100, 100)).toBe(Comparison.Correct);
  });

  it("puts the target above the guess on the upper buckets", () => {
    expect(compare(code100, 100, 84)).toBe(Comparison.Greater);
    expect(compare(code100, 100, 14)).toBe(Comparison.FarGreater);
  });

  it("puts the target below the guess on the lower buckets", () => {
    expect(compare(code100, 100, 116)).toBe(Comparison.Less);
    expect(compare(code100, 100, 186)).toBe(Comparison.FarLess);
  });

  it("keeps band edges in the inner bucket", () => {
    expect(compare(code100, 100, 85)).toBe(Comparison.Near); // delta 15 == near
    expect(compare(code100, 100, 15)).toBe(Comparison.Greater); // delta 85 == far
    expect(compare(code100, 100, 115)).toBe(Comparison.Near);
    expect(compare(code100, 100, 185)).toBe(Comparison.Less);
  });

  it("handles height edges at the most common height", () => {
    const h = heightThreshold(168);
    expect(compare(h, 168, 165)).toBe(Comparison.Near);
    expect(compare(h, 168, 164)).toBe(Comparison.Greater);
    expect(compare(h, 168, 153)).toBe(Comparison.Greater);
    expect(compare(h, 168, 152)).toBe(Comparison.FarGreater);
    expect(compare(h, 168, 171)).toBe(Comparison.Near);
    expect(compare(h, 168, 172)).toBe(Comparison.Less);
    expect(compare(h, 168, 183)).toBe(Comparison.Less);
    expect(compare(h, 168, 184)).toBe(Comparison.FarLess);
  });

  it("classifies a far-off code and height as far less", () => {
    expect(compare(codeThreshold(10), 10, 200)).toBe(Comparison.FarLess);
    expect(compare(heightThreshold(160), 160, 180)).toBe(Comparison.FarLess);
  });
});
