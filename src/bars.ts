/**
 * Purpose: Lay out bars, clusters, and stack segments in data space.
 * Intent: One x unit per row; every row is anchored at its input index.
 */

import type { BarGeometry, ChartMode, NormalizedRow } from "./types.js";

function clusterBars(row: NormalizedRow, seriesCount: number, barWidth: number, clusterGap: number): BarGeometry[] {
  const w = barWidth / seriesCount;
  const span = barWidth + (seriesCount - 1) * clusterGap;
  const left = row.index - span / 2;
  const out: BarGeometry[] = [];
  for (let si = 0; si < seriesCount; si++) {
    out.push({
      rowIndex: row.index,
      seriesIndex: si,
      xCenter: left + si * (w + clusterGap) + w / 2,
      xHalfWidth: w / 2,
      yBase: 0,
      yExtent: row.values[si] ?? 0,
    });
  }
  return out;
}

// Straight running sum in series order; negative segments are not split out.
function stackedBars(row: NormalizedRow, seriesCount: number, barWidth: number): BarGeometry[] {
  const out: BarGeometry[] = [];
  let base = 0;
  for (let si = 0; si < seriesCount; si++) {
    const v = row.values[si] ?? 0;
    out.push({ rowIndex: row.index, seriesIndex: si, xCenter: row.index, xHalfWidth: barWidth / 2, yBase: base, yExtent: v });
    base += v;
  }
  return out;
}

export function buildBars(
  rows: readonly NormalizedRow[],
  seriesCount: number,
  mode: ChartMode,
  barWidth: number,
  clusterGap: number
): BarGeometry[] {
  const out: BarGeometry[] = [];
  for (const row of rows) {
    switch (mode) {
      case "basic":
        out.push({
          rowIndex: row.index,
          seriesIndex: 0,
          xCenter: row.index,
          xHalfWidth: barWidth / 2,
          yBase: 0,
          yExtent: row.values[0] ?? 0,
        });
        break;
      case "clustered":
        out.push(...clusterBars(row, seriesCount, barWidth, clusterGap));
        break;
      case "stacked":
      case "stacked100":
        out.push(...stackedBars(row, seriesCount, barWidth));
        break;
    }
  }
  return out;
}
