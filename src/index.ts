export { computeColumnChart, renderColumnChart } from "./engine.js";
export { normalizeRows } from "./rows.js";
export { resolveSeries, toPercentOfTotal, isChartMode } from "./modes.js";
export { computeXRange, buildXTicks } from "./axis.js";
export { buildBars } from "./bars.js";
export { buildWhiskers, modeAllowsWhiskers } from "./whiskers.js";
export { compileAccessor, toKeySequence, type Accessor } from "./selectors.js";
export {
  DEFAULT_CHART_MODE,
  DEFAULT_CHART_STYLE,
  DEFAULT_PLOT_SIZE,
  DEFAULT_SERIES_COLORS,
  resolveChartConfig,
  type AxisOptions,
  type BarStyleOptions,
  type ChartStyle,
  type ColumnChartOptions,
  type ResolvedChartConfig,
} from "./config.js";
export { defaultLabelForKey } from "./chart_common.js";
export { ColumnChartError, InvalidConfigurationError, MissingKeyError, type ColumnChartErrorKind } from "./errors.js";
export { createSvgPlotter, type SvgPlotterOptions } from "./web/svg_plotter.js";
export type {
  AxisKeyPair,
  AxisStyle,
  ChartPlotter,
  DrawCallback,
  PlotRequest,
  PlotSize,
  PlotSurface,
  SeriesStyle,
  SeriesStyleHandle,
  ValueFormat,
} from "./plotter_types.js";
export { CHART_MODES } from "./types.js";
export type {
  BarGeometry,
  ChartMessage,
  ChartMessageCode,
  ChartMode,
  ColumnChartGeometry,
  KeySequence,
  NormalizedRow,
  Row,
  Selector,
  SingleKey,
  WhiskerGeometry,
  XRange,
  XTick,
} from "./types.js";
