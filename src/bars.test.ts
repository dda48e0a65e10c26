import { describe, expect, it } from "vitest";
import { buildXTicks, computeXRange } from "./axis.js";
import { buildBars } from "./bars.js";
import type { NormalizedRow } from "./types.js";
import { buildWhiskers } from "./whiskers.js";

const row = (index: number, values: number[], errors: number[] = values.map(() => 0)): NormalizedRow => ({
  index,
  label: String.fromCharCode(65 + index),
  values,
  errors,
});

describe("buildBars", () => {
  it("places one bar per row in basic mode", () => {
    const rows = [row(0, [1]), row(1, [2]), row(2, [3])];
    expect(buildBars(rows, 1, "basic", 0.8, 0)).toEqual([
      { rowIndex: 0, seriesIndex: 0, xCenter: 0, xHalfWidth: 0.4, yBase: 0, yExtent: 1 },
      { rowIndex: 1, seriesIndex: 0, xCenter: 1, xHalfWidth: 0.4, yBase: 0, yExtent: 2 },
      { rowIndex: 2, seriesIndex: 0, xCenter: 2, xHalfWidth: 0.4, yBase: 0, yExtent: 3 },
    ]);
  });

  it("splits a cluster evenly around the row index", () => {
    const bars = buildBars([row(0, [5, 7])], 2, "clustered", 0.8, 0);
    expect(bars).toHaveLength(2);
    expect(bars[0]?.xCenter).toBeCloseTo(-0.2, 12);
    expect(bars[1]?.xCenter).toBeCloseTo(0.2, 12);
    expect(bars.map((b) => b.xHalfWidth)).toEqual([0.2, 0.2]);
    expect(bars.map((b) => b.yExtent)).toEqual([5, 7]);
  });

  it("widens the cluster span by the gaps between bars", () => {
    const bars = buildBars([row(1, [1, 2, 3])], 3, "clustered", 0.9, 0.05);
    expect(bars.map((b) => b.seriesIndex)).toEqual([0, 1, 2]);
    expect(bars[0]?.xCenter).toBeCloseTo(0.65, 12);
    expect(bars[1]?.xCenter).toBeCloseTo(1.0, 12);
    expect(bars[2]?.xCenter).toBeCloseTo(1.35, 12);

    const first = bars[0];
    const last = bars[2];
    if (!first || !last) throw new Error("expected three bars");
    const left = first.xCenter - first.xHalfWidth;
    const right = last.xCenter + last.xHalfWidth;
    expect(right - left).toBeCloseTo(3 * (0.9 / 3) + 2 * 0.05, 12);
    expect((left + right) / 2).toBeCloseTo(1, 12);
  });

  it("stacks segments bottom-up with running bases", () => {
    const bars = buildBars([row(0, [25, 25, 50])], 3, "stacked100", 0.8, 0);
    expect(bars.map((b) => [b.yBase, b.yExtent])).toEqual([
      [0, 25],
      [25, 25],
      [50, 50],
    ]);
    expect(bars.every((b) => b.xCenter === 0 && b.xHalfWidth === 0.4)).toBe(true);
  });

  it("keeps a straight running sum for mixed-sign stacks", () => {
    const bars = buildBars([row(0, [3, -1, 2])], 3, "stacked", 1, 0);
    expect(bars.map((b) => b.yBase)).toEqual([0, 3, 2]);
  });

  it("returns no geometry for no rows", () => {
    expect(buildBars([], 2, "clustered", 0.8, 0)).toEqual([]);
  });
});

describe("buildWhiskers", () => {
  it("spans value ± error with caps scaled by the bar half-width", () => {
    const rows = [row(0, [4], [1.5])];
    const bars = buildBars(rows, 1, "basic", 0.8, 0);
    expect(buildWhiskers(bars, rows, "basic", 0.25)).toEqual([
      { rowIndex: 0, seriesIndex: 0, yLow: 2.5, yHigh: 5.5, capHalfWidth: 0.1 },
    ]);
  });

  it("emits degenerate whiskers for zero errors", () => {
    const rows = [row(0, [2, 3], [0, 1])];
    const bars = buildBars(rows, 2, "clustered", 0.8, 0);
    const whiskers = buildWhiskers(bars, rows, "clustered", 0.5);
    expect(whiskers.map((w) => [w.seriesIndex, w.yLow, w.yHigh])).toEqual([
      [0, 2, 2],
      [1, 2, 4],
    ]);
  });

  it("omits whiskers for stacked modes", () => {
    const rows = [row(0, [1, 2], [1, 1])];
    const bars = buildBars(rows, 2, "stacked", 0.8, 0);
    expect(buildWhiskers(bars, rows, "stacked", 0.25)).toEqual([]);
    expect(buildWhiskers(bars, rows, "stacked100", 0.25)).toEqual([]);
  });
});

describe("computeXRange", () => {
  it("uses the larger of inset and half bar width", () => {
    expect(computeXRange(3, 0, 0.8)).toEqual({ min: -0.4, max: 2.4 });
    expect(computeXRange(3, 1, 0.8)).toEqual({ min: -1, max: 3 });
    expect(computeXRange(4, 0.25, 1.2)).toEqual({ min: -0.6, max: 3.6 });
  });

  it("lists one tick per row", () => {
    expect(buildXTicks([row(0, [1]), row(1, [2])])).toEqual([
      { index: 0, label: "A" },
      { index: 1, label: "B" },
    ]);
  });
});
