/**
 * Purpose: Render a compact bottom legend for column charts.
 * Intent: One swatch per series; nothing for single-series charts.
 */

import type { SeriesStyleHandle } from "../plotter_types.js";
import { colorAt } from "./chart_shared.js";

export function appendChartLegend(view: HTMLElement, handles: readonly SeriesStyleHandle[]): void {
  if (handles.length <= 1) return;

  const legend = document.createElement("div");
  legend.className = "chart-legend";
  legend.style.display = "flex";
  legend.style.flexWrap = "wrap";
  legend.style.justifyContent = "center";
  legend.style.alignItems = "center";
  legend.style.gap = "8px 14px";
  legend.style.marginTop = "8px";
  legend.style.fontSize = "12px";
  legend.style.color = "var(--chart-muted, #6a718a)";

  for (const h of handles) {
    const item = document.createElement("div");
    item.className = "chart-legend-item";
    item.dataset.series = String(h.seriesIndex);
    item.style.display = "inline-flex";
    item.style.alignItems = "center";
    item.style.gap = "8px";

    // Per-bar styles have no single color; the first row's color stands in.
    const swatch = document.createElement("span");
    swatch.className = "chart-legend-swatch";
    swatch.style.background = colorAt(h.style, 0);
    swatch.style.width = "10px";
    swatch.style.height = "10px";
    swatch.style.borderRadius = "3px";
    swatch.style.display = "inline-block";

    const text = document.createElement("span");
    text.className = "chart-legend-label";
    text.textContent = h.label;

    item.appendChild(swatch);
    item.appendChild(text);
    legend.appendChild(item);
  }

  view.appendChild(legend);
}
