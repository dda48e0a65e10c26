/**
 * Purpose: Compute the x-domain and category ticks for a column chart.
 * Intent: Keep the outermost bars clear of the plot edge for any bar width / inset mix.
 */

import type { NormalizedRow, XRange, XTick } from "./types.js";

export function computeXRange(rowCount: number, inset: number, barWidth: number): XRange {
  const pad = Math.max(inset, barWidth / 2);
  return { min: -pad, max: rowCount - 1 + pad };
}

export function buildXTicks(rows: readonly NormalizedRow[]): XTick[] {
  return rows.map((r) => ({ index: r.index, label: r.label }));
}
