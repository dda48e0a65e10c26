/**
 * Purpose: Decide series count and per-row series values for a display mode.
 * Intent: Keep the percentage renormalization of stacked100 in one place.
 */

import { err } from "./chart_common.js";
import { CHART_MODES, type ChartMessage, type ChartMode, type NormalizedRow } from "./types.js";

export function isChartMode(v: unknown): v is ChartMode {
  return typeof v === "string" && (CHART_MODES as readonly string[]).includes(v);
}

function sumOf(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function toPercentOfTotal(values: readonly number[]): number[] {
  let scaled = values;
  let total = sumOf(values);
  // Finite values can still overflow when summed; rescale by the largest magnitude.
  if (!Number.isFinite(total)) {
    let peak = 0;
    for (const v of values) peak = Math.max(peak, Math.abs(v));
    scaled = values.map((v) => v / peak);
    total = sumOf(scaled);
  }
  if (total === 0) return values.map(() => 0);
  return scaled.map((v) => (v / total) * 100);
}

export function resolveSeries(
  rows: readonly NormalizedRow[],
  mode: unknown,
  valueKeyCount: number
): { seriesCount: number; rows: NormalizedRow[]; messages: ChartMessage[] } {
  const messages: ChartMessage[] = [];
  if (!isChartMode(mode)) {
    err(messages, "CC_UNKNOWN_MODE", `Unknown chart mode: ${String(mode)}`);
    return { seriesCount: 0, rows: [], messages };
  }

  const first = rows[0];
  const seriesCount = first ? first.values.length : valueKeyCount;

  if (mode === "basic" && seriesCount !== 1) {
    err(messages, "CC_BASIC_SINGLE_VALUE_KEY", `basic mode expects one value per row, got ${seriesCount}`, {
      ...(first ? { rowIndex: first.index } : {}),
    });
    return { seriesCount, rows: [], messages };
  }

  if (mode !== "stacked100") return { seriesCount, rows: [...rows], messages };

  const out = rows.map((r) => Object.freeze({ ...r, values: Object.freeze(toPercentOfTotal(r.values)) }));
  return { seriesCount, rows: out, messages };
}
