/**
 * Purpose: Shared chart math helpers (ticks, value extents).
 * Intent: Keep DOM/chart rendering code readable and deterministic.
 */

import type { BarGeometry, WhiskerGeometry } from "../types.js";

export function decimalsForStep(step: number): number {
  const abs = Math.abs(step);
  if (!Number.isFinite(abs) || abs === 0) return 0;
  for (let d = 0; d <= 6; d++) {
    const scaled = abs * 10 ** d;
    if (Math.abs(scaled - Math.round(scaled)) < 1e-9) return d;
  }
  return abs < 1 ? 2 : 0;
}

function niceStep(range: number, tickCount: number): number {
  const raw = range / Math.max(1, tickCount - 1);
  if (!Number.isFinite(raw) || raw === 0) return 1;
  const exp = Math.floor(Math.log10(Math.abs(raw)));
  const base = 10 ** exp;
  const f = Math.abs(raw) / base;
  const niceF = f <= 1 ? 1 : f <= 2 ? 2 : f <= 5 ? 5 : 10;
  return niceF * base;
}

export function niceTicks(
  min: number,
  max: number,
  tickCount: number
): { min: number; max: number; step: number; ticks: number[] } {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return { min: 0, max: 1, step: 1, ticks: [0, 1] };
  if (min === max) {
    const step = min === 0 ? 1 : Math.abs(min) * 0.1;
    return { min: min - step, max: max + step, step, ticks: [min - step, min, max + step] };
  }

  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  const step = niceStep(hi - lo, tickCount);
  const niceMin = Math.floor(lo / step) * step;
  const niceMax = Math.ceil(hi / step) * step;
  const ticks: number[] = [];
  // Add a tiny epsilon so we include the last tick despite float error.
  const eps = step * 1e-9;
  for (let v = niceMin; v <= niceMax + eps; v += step) ticks.push(v);
  if (ticks.length === 1) ticks.push((ticks[0] ?? niceMin) + step);
  return { min: niceMin, max: niceMax, step, ticks };
}

/**
 * Y-domain of the emitted geometry: bar bases and tops plus whisker ends,
 * always including 0 and padded 6% on the open side(s).
 */
export function valueDomain(
  bars: readonly BarGeometry[],
  whiskers: readonly WhiskerGeometry[]
): { min: number; max: number } {
  const ys: number[] = [];
  for (const b of bars) ys.push(b.yBase, b.yBase + b.yExtent);
  for (const w of whiskers) ys.push(w.yLow, w.yHigh);

  let ymin = 0;
  let ymax = 0;
  for (const y of ys) {
    if (!Number.isFinite(y)) continue;
    ymin = Math.min(ymin, y);
    ymax = Math.max(ymax, y);
  }
  if (ymax === ymin) ymax = ymin + 1;

  const allNonNegative = ymin >= 0;
  const allNonPositive = ymax <= 0;
  const yPad = (ymax - ymin) * 0.06;
  if (Number.isFinite(yPad) && yPad > 0) {
    if (allNonNegative) {
      ymax += yPad;
    } else if (allNonPositive) {
      ymin -= yPad;
    } else {
      ymin -= yPad;
      ymax += yPad;
    }
  }
  return { min: ymin, max: ymax };
}
