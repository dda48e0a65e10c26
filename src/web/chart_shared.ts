/**
 * Purpose: Provide shared helpers for SVG column-chart rendering.
 * Intent: Keep the plotter small, consistent, and deterministic.
 */

import type { AxisStyle, SeriesStyle, ValueFormat } from "../plotter_types.js";
import { decimalsForStep } from "./chart_math.js";
import { formatFormattedValue } from "./format.js";

export const SVG_NS = "http://www.w3.org/2000/svg";

export const DEFAULT_CHART_SERIES_STROKE_WIDTH = 1.6;
export const DEFAULT_WHISKER_STROKE_WIDTH = 1.2;

export interface ChartCardClasses {
  container: string;
  title: string;
  subtitle: string;
}

export interface ChartMargin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export const DEFAULT_CHART_MARGIN: Readonly<ChartMargin> = Object.freeze({ top: 12, right: 14, bottom: 42, left: 54 });

const defaultClasses: ChartCardClasses = Object.freeze({
  container: "view",
  title: "view-title",
  subtitle: "muted",
});

export function resolveClasses(classes: Partial<ChartCardClasses> | undefined): ChartCardClasses {
  return { ...defaultClasses, ...(classes ?? {}) };
}

/** Color of bar `index` under a series style; function styles are indexed by row. */
export function colorAt(style: SeriesStyle, index: number): string {
  return typeof style === "string" ? style : style(index);
}

export function formatTick(v: number, fmt: ValueFormat | undefined, step: number): string {
  if (fmt) return formatFormattedValue(v, fmt);
  const digits = decimalsForStep(step);
  const txt = v.toFixed(digits);
  if (digits === 0) return txt;
  return txt.replace(/\.0+$/, "").replace(/(\.\d*?)0+$/, "$1");
}

export function buildHeader(axisStyle: AxisStyle, classes: ChartCardClasses): HTMLElement {
  const container = document.createElement("div");
  container.className = classes.container;

  const titleText = axisStyle.title ?? "";
  if (titleText.trim()) {
    const h = document.createElement("div");
    h.className = classes.title;
    h.textContent = titleText;
    container.appendChild(h);
  }

  const subtitleText = axisStyle.subtitle ?? "";
  if (subtitleText.trim()) {
    const sub = document.createElement("div");
    sub.className = classes.subtitle;
    sub.style.marginBottom = "10px";
    sub.textContent = subtitleText;
    container.appendChild(sub);
  }

  return container;
}

export function svgEl(tag: string, attrs: Record<string, string>): SVGElement {
  const el = document.createElementNS(SVG_NS, tag);
  for (const [k, v] of Object.entries(attrs)) el.setAttribute(k, v);
  return el;
}
