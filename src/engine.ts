/**
 * Purpose: Compute column-chart geometry and hand it to a plotting backend.
 * Intent: Validate everything first; no partially built chart ever escapes a fault.
 */

import { buildXTicks, computeXRange } from "./axis.js";
import { buildBars } from "./bars.js";
import { defaultLabelForKey, warn } from "./chart_common.js";
import {
  DEFAULT_SERIES_COLORS,
  axisStyleFromOptions,
  resolveChartConfig,
  resolvePlotSize,
  resolveYFormat,
  type ColumnChartOptions,
  type ResolvedChartConfig,
} from "./config.js";
import { raiseFromMessages, throwOnErrors } from "./errors.js";
import { resolveSeries } from "./modes.js";
import type { ChartPlotter, PlotRequest, SeriesStyle, SeriesStyleHandle } from "./plotter_types.js";
import { normalizeRows } from "./rows.js";
import type { ColumnChartGeometry } from "./types.js";
import { buildWhiskers, modeAllowsWhiskers } from "./whiskers.js";

function compute(opts: ColumnChartOptions): { geometry: ColumnChartGeometry; config: ResolvedChartConfig } {
  const resolved = resolveChartConfig(opts);
  const config = resolved.config;
  if (!config) raiseFromMessages(resolved.messages);
  const messages = [...resolved.messages];

  const normalized = normalizeRows(opts.data, config.labelKey, config.valueKeys, config.errorKeys);
  messages.push(...normalized.messages);
  throwOnErrors(messages);

  const series = resolveSeries(normalized.rows, config.mode, config.valueKeys.length);
  messages.push(...series.messages);
  throwOnErrors(messages);

  const { barWidth, clusterGap, inset, whiskerSize } = config.style;
  const bars = buildBars(series.rows, series.seriesCount, config.mode, barWidth, clusterGap);

  const wantsWhiskers = config.errorKeys.length > 0;
  if (wantsWhiskers && !modeAllowsWhiskers(config.mode)) {
    warn(messages, "CC_WHISKERS_IGNORED", `Error keys are ignored in ${config.mode} mode`);
  }
  const whiskers = wantsWhiskers ? buildWhiskers(bars, series.rows, config.mode, whiskerSize) : [];

  const geometry: ColumnChartGeometry = {
    mode: config.mode,
    seriesCount: series.seriesCount,
    rows: Object.freeze(series.rows),
    bars: Object.freeze(bars),
    whiskers: Object.freeze(whiskers),
    xRange: computeXRange(series.rows.length, inset, barWidth),
    xTicks: Object.freeze(buildXTicks(series.rows)),
    messages,
  };
  return { geometry, config };
}

/**
 * Computes the full data-space geometry of a column chart.
 *
 * Throws `MissingKeyError` when a row lacks its label or a value, and
 * `InvalidConfigurationError` for any other invalid option or row shape.
 */
export function computeColumnChart(opts: ColumnChartOptions): ColumnChartGeometry {
  return compute(opts).geometry;
}

function seriesLabel(opts: ColumnChartOptions, config: ResolvedChartConfig, seriesCount: number, si: number): string {
  const given = (opts.labels?.[si] ?? "").trim();
  if (given) return given;
  const key = config.valueKeys.length === seriesCount ? config.valueKeys[si] : undefined;
  return key === undefined ? defaultLabelForKey(si) : defaultLabelForKey(key);
}

function seriesStyle(opts: ColumnChartOptions, si: number): SeriesStyle {
  const perBar = opts.barStyle?.color;
  if (perBar) return (rowIndex: number) => perBar(rowIndex, si);
  const colors = opts.barStyle?.colors;
  const palette = colors && colors.length > 0 ? colors : DEFAULT_SERIES_COLORS;
  return palette[si % palette.length] ?? DEFAULT_SERIES_COLORS[0] ?? "#4c6fff";
}

/**
 * Computes the chart geometry and makes exactly one `plot` call on `plotter`,
 * returning whatever the plotter produces.
 */
export function renderColumnChart<T>(opts: ColumnChartOptions, plotter: ChartPlotter<T>): T {
  const { geometry, config } = compute(opts);

  const handles: SeriesStyleHandle[] = [];
  for (let si = 0; si < geometry.seriesCount; si++) {
    handles.push({ seriesIndex: si, label: seriesLabel(opts, config, geometry.seriesCount, si), style: seriesStyle(opts, si) });
  }

  const request: PlotRequest = {
    size: resolvePlotSize(opts.size),
    axisStyle: axisStyleFromOptions(opts.axis),
    xRange: geometry.xRange,
    xTicks: geometry.xTicks,
    yFormat: resolveYFormat(config.mode, opts.axis),
    style: handles,
  };

  return plotter.plot(request, (surface) => {
    const axes = ["x", "y"] as const;
    for (const h of handles) {
      const bars = geometry.bars.filter((b) => b.seriesIndex === h.seriesIndex);
      surface.bars(bars, axes, h.style, h.label);
    }
    for (const h of handles) {
      const whiskers = geometry.whiskers.filter((w) => w.seriesIndex === h.seriesIndex);
      if (whiskers.length > 0) surface.whiskers(whiskers, axes, h.style, h.label);
    }
  });
}
