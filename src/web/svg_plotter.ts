/**
 * Purpose: Draw computed column-chart geometry into a lightweight SVG chart card.
 * Intent: Provide a dependency-free plotting backend; the y-domain comes from the geometry it is given.
 */

import type {
  AxisKeyPair,
  ChartPlotter,
  DrawCallback,
  PlotRequest,
  SeriesStyle,
} from "../plotter_types.js";
import type { BarGeometry, WhiskerGeometry } from "../types.js";
import { appendChartLegend } from "./chart_legend.js";
import { niceTicks, valueDomain } from "./chart_math.js";
import {
  DEFAULT_CHART_MARGIN,
  DEFAULT_CHART_SERIES_STROKE_WIDTH,
  DEFAULT_WHISKER_STROKE_WIDTH,
  buildHeader,
  colorAt,
  formatTick,
  resolveClasses,
  svgEl,
  type ChartCardClasses,
  type ChartMargin,
} from "./chart_shared.js";
import { formatValue } from "./format.js";

export interface SvgPlotterOptions {
  classes?: Partial<ChartCardClasses>;
  margin?: Partial<ChartMargin>;
  yTickCount?: number;
  /** Draw degenerate (zero-error) whiskers too. */
  drawZeroWhiskers?: boolean;
}

interface BarLayer {
  geometry: readonly BarGeometry[];
  style: SeriesStyle;
  label: string;
}

interface WhiskerLayer {
  geometry: readonly WhiskerGeometry[];
  style: SeriesStyle;
  label: string;
}

// A single x/y pair: every layer must map onto it.
function assertAxes(axes: AxisKeyPair): void {
  if (axes[0] !== "x" || axes[1] !== "y") throw new Error(`svg plotter: unsupported axis pair ${axes.join("/")}`);
}

function recordLayers(draw: DrawCallback): { bars: BarLayer[]; whiskers: WhiskerLayer[] } {
  const bars: BarLayer[] = [];
  const whiskers: WhiskerLayer[] = [];
  draw({
    bars(geometry, axes, style, label) {
      assertAxes(axes);
      bars.push({ geometry, style, label });
    },
    whiskers(geometry, axes, style, label) {
      assertAxes(axes);
      whiskers.push({ geometry, style, label });
    },
  });
  return { bars, whiskers };
}

const barKey = (rowIndex: number, seriesIndex: number) => `${rowIndex}:${seriesIndex}`;

export function createSvgPlotter(options: SvgPlotterOptions = {}): ChartPlotter<HTMLElement> {
  const classes = resolveClasses(options.classes);
  const margin: ChartMargin = { ...DEFAULT_CHART_MARGIN, ...(options.margin ?? {}) };
  const yTickCount = options.yTickCount ?? 5;
  const drawZeroWhiskers = options.drawZeroWhiskers ?? false;

  return {
    plot(request: PlotRequest, draw: DrawCallback): HTMLElement {
      const view = buildHeader(request.axisStyle, classes);
      const layers = recordLayers(draw);

      const { width, height } = request.size;
      const plotW = Math.max(0, width - margin.left - margin.right);
      const plotH = Math.max(0, height - margin.top - margin.bottom);

      const allBars = layers.bars.flatMap((l) => l.geometry);
      const allWhiskers = layers.whiskers.flatMap((l) => l.geometry);
      const domain = valueDomain(allBars, allWhiskers);
      const yTicks = niceTicks(domain.min, domain.max, yTickCount);
      const ymin = yTicks.min;
      const ymax = yTicks.max;

      const xmin = request.xRange.min;
      const xSpan = request.xRange.max - request.xRange.min;
      const xDen = xSpan > 0 ? xSpan : 1;
      const sx = (x: number) => margin.left + ((x - xmin) / xDen) * plotW;
      const sy = (y: number) => margin.top + plotH - ((y - ymin) / (ymax - ymin)) * plotH;

      const svg = svgEl("svg", {
        viewBox: `0 0 ${width} ${height}`,
        width: "100%",
        height: String(height),
      });
      svg.style.display = "block";

      if (request.axisStyle.grid !== false) {
        const gridLines: string[] = [];
        for (const v of yTicks.ticks) {
          const y = sy(v);
          gridLines.push(`M ${margin.left} ${y.toFixed(2)} L ${(margin.left + plotW).toFixed(2)} ${y.toFixed(2)}`);
        }
        svg.appendChild(
          svgEl("path", {
            class: "chart-grid",
            fill: "none",
            stroke: "#eef0f6",
            "stroke-width": "1",
            "stroke-dasharray": "3 3",
            d: gridLines.join(" "),
          })
        );
      }

      svg.appendChild(
        svgEl("path", {
          class: "chart-axis",
          fill: "none",
          stroke: "#c9cedf",
          "stroke-width": "1",
          d: `M ${margin.left} ${margin.top} L ${margin.left} ${margin.top + plotH} L ${margin.left + plotW} ${margin.top + plotH}`,
        })
      );

      for (const v of yTicks.ticks) {
        const label = svgEl("text", {
          class: "chart-y-tick",
          x: String(margin.left - 8),
          y: sy(v).toFixed(2),
          fill: "#6a718a",
          "font-size": "10",
          "text-anchor": "end",
          "dominant-baseline": "central",
        });
        label.textContent = formatTick(v, request.yFormat, yTicks.step);
        svg.appendChild(label);
      }

      const barCenters = new Map<string, number>();
      for (const layer of layers.bars) {
        for (const b of layer.geometry) {
          barCenters.set(barKey(b.rowIndex, b.seriesIndex), b.xCenter);
          const color = colorAt(layer.style, b.rowIndex);
          const x0 = sx(b.xCenter - b.xHalfWidth);
          const x1 = sx(b.xCenter + b.xHalfWidth);
          const ya = sy(b.yBase);
          const yb = sy(b.yBase + b.yExtent);
          const rect = svgEl("rect", {
            class: "chart-bar",
            x: x0.toFixed(2),
            y: Math.min(ya, yb).toFixed(2),
            width: (x1 - x0).toFixed(2),
            height: Math.abs(yb - ya).toFixed(2),
            fill: color,
            "fill-opacity": "0.28",
            stroke: color,
            "stroke-width": String(DEFAULT_CHART_SERIES_STROKE_WIDTH),
            "data-row": String(b.rowIndex),
            "data-series": String(b.seriesIndex),
          });
          const title = svgEl("title", {});
          title.textContent = `${layer.label}: ${formatValue(b.yExtent)}`;
          rect.appendChild(title);
          svg.appendChild(rect);
        }
      }

      for (const layer of layers.whiskers) {
        for (const w of layer.geometry) {
          if (!drawZeroWhiskers && w.yLow === w.yHigh) continue;
          const xc = barCenters.get(barKey(w.rowIndex, w.seriesIndex));
          if (xc === undefined) continue;
          const cx = sx(xc).toFixed(2);
          const cl = sx(xc - w.capHalfWidth).toFixed(2);
          const cr = sx(xc + w.capHalfWidth).toFixed(2);
          const lo = sy(w.yLow).toFixed(2);
          const hi = sy(w.yHigh).toFixed(2);
          svg.appendChild(
            svgEl("path", {
              class: "chart-whisker",
              fill: "none",
              stroke: colorAt(layer.style, w.rowIndex),
              "stroke-width": String(DEFAULT_WHISKER_STROKE_WIDTH),
              d: `M ${cx} ${lo} L ${cx} ${hi} M ${cl} ${lo} L ${cr} ${lo} M ${cl} ${hi} L ${cr} ${hi}`,
              "data-row": String(w.rowIndex),
              "data-series": String(w.seriesIndex),
            })
          );
        }
      }

      for (const tick of request.xTicks) {
        const x = sx(tick.index);
        svg.appendChild(
          svgEl("path", {
            fill: "none",
            stroke: "#c9cedf",
            "stroke-width": "1",
            d: `M ${x.toFixed(2)} ${(margin.top + plotH).toFixed(2)} L ${x.toFixed(2)} ${(margin.top + plotH + 4).toFixed(2)}`,
          })
        );
        const label = svgEl("text", {
          class: "chart-x-tick",
          x: x.toFixed(2),
          y: String(margin.top + plotH + 18),
          fill: "#6a718a",
          "font-size": "10",
          "text-anchor": "middle",
        });
        label.textContent = formatValue(tick.label);
        svg.appendChild(label);
      }

      const xAxisLabel = (request.axisStyle.xLabel ?? "").trim();
      if (xAxisLabel) {
        const xLabel = svgEl("text", {
          class: "chart-x-label",
          x: String(margin.left + plotW),
          y: String(margin.top + plotH + 34),
          fill: "#6a718a",
          "font-size": "10",
          "text-anchor": "end",
        });
        xLabel.textContent = xAxisLabel;
        svg.appendChild(xLabel);
      }

      const yAxisLabel = (request.axisStyle.yLabel ?? "").trim();
      if (yAxisLabel) {
        const yLabel = svgEl("text", {
          class: "chart-y-label",
          x: "0",
          y: "0",
          transform: `translate(12 ${margin.top}) rotate(-90)`,
          fill: "#6a718a",
          "font-size": "10",
          "text-anchor": "end",
        });
        yLabel.textContent = yAxisLabel;
        svg.appendChild(yLabel);
      }

      view.appendChild(svg);
      appendChartLegend(view, request.style);
      return view;
    },
  };
}
