/**
 * Purpose: Compute error-whisker extents for single-value bars.
 * Intent: Stacked segments are not point estimates, so they never get whiskers.
 */

import type { BarGeometry, ChartMode, NormalizedRow, WhiskerGeometry } from "./types.js";

export function modeAllowsWhiskers(mode: ChartMode): boolean {
  return mode === "basic" || mode === "clustered";
}

export function buildWhiskers(
  bars: readonly BarGeometry[],
  rows: readonly NormalizedRow[],
  mode: ChartMode,
  whiskerSize: number
): WhiskerGeometry[] {
  if (!modeAllowsWhiskers(mode)) return [];
  const errorsByRow = new Map<number, readonly number[]>(rows.map((r) => [r.index, r.errors]));

  // Zero errors still yield a (degenerate) record; renderers decide whether to draw it.
  return bars.map((bar) => {
    const e = errorsByRow.get(bar.rowIndex)?.[bar.seriesIndex] ?? 0;
    const v = bar.yBase + bar.yExtent;
    return {
      rowIndex: bar.rowIndex,
      seriesIndex: bar.seriesIndex,
      yLow: v - e,
      yHigh: v + e,
      capHalfWidth: whiskerSize * bar.xHalfWidth,
    };
  });
}
