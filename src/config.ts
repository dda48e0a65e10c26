/**
 * Purpose: Validate column-chart options and merge them over frozen defaults.
 * Intent: Surface every configuration problem as a coded message before any geometry is built.
 */

import { asNumber, bannedKeys, err, hasErrors, keyText } from "./chart_common.js";
import { isChartMode } from "./modes.js";
import { isSingleKey, toKeySequence } from "./selectors.js";
import type { AxisStyle, PlotSize, ValueFormat } from "./plotter_types.js";
import type { ChartMessage, ChartMode, KeySequence, Row, Selector, SingleKey } from "./types.js";

export interface ChartStyle {
  /** Fraction of one row slot taken by a bar (or a whole cluster). */
  barWidth: number;
  clusterGap: number;
  /** Horizontal margin beyond the outermost rows, in row units. */
  inset: number;
  /** Whisker cap size as a fraction of the bar half-width. */
  whiskerSize: number;
}

export interface BarStyleOptions extends Partial<ChartStyle> {
  /** Palette cycled by series index. */
  colors?: readonly string[];
  /** Per-bar color; takes precedence over `colors`. */
  color?: (rowIndex: number, seriesIndex: number) => string;
}

export interface AxisOptions extends AxisStyle {
  yFormat?: ValueFormat;
}

export interface ColumnChartOptions {
  data: readonly Row[];
  labelKey: SingleKey;
  valueKeys: Selector;
  errorKeys?: Selector;
  mode?: ChartMode;
  size?: Partial<PlotSize>;
  barStyle?: BarStyleOptions;
  /** Legend text per series, in value-key order. */
  labels?: readonly string[];
  axis?: AxisOptions;
}

export interface ResolvedChartConfig {
  labelKey: SingleKey;
  valueKeys: KeySequence;
  errorKeys: KeySequence;
  mode: ChartMode;
  style: Readonly<ChartStyle>;
}

export const DEFAULT_CHART_STYLE: Readonly<ChartStyle> = Object.freeze({
  barWidth: 0.8,
  clusterGap: 0,
  inset: 1,
  whiskerSize: 0.25,
});

export const DEFAULT_SERIES_COLORS = Object.freeze(["#4c6fff", "#22c55e", "#f97316", "#ef4444", "#a855f7", "#06b6d4"]);

export const DEFAULT_CHART_MODE: ChartMode = "basic";

export const DEFAULT_PLOT_SIZE: Readonly<PlotSize> = Object.freeze({ width: 720, height: 260 });

function validateKeys(raw: unknown, field: "valueKeys" | "errorKeys", messages: ChartMessage[]): KeySequence | null {
  if (raw === undefined && field === "errorKeys") return Object.freeze([]);
  const list: unknown[] = Array.isArray(raw) ? raw : [raw];
  const keys: SingleKey[] = [];
  const code = field === "valueKeys" ? "CC_VALUE_KEYS" : "CC_ERROR_KEYS";
  for (const k of list) {
    if (!isSingleKey(k)) {
      err(messages, code, `${field} entries must be property names or non-negative integer indexes`);
      return null;
    }
    if (typeof k === "string" && bannedKeys.has(k)) {
      err(messages, "CC_DISALLOWED_KEY", `Disallowed ${field} entry: ${k}`, { key: k });
      return null;
    }
    keys.push(k);
  }
  if (field === "valueKeys" && keys.length === 0) {
    err(messages, "CC_VALUE_KEYS", "valueKeys must name at least one key");
    return null;
  }
  return toKeySequence(keys);
}

function validateStyleNumber(
  raw: unknown,
  field: keyof ChartStyle,
  fallback: number,
  allowZero: boolean,
  messages: ChartMessage[]
): number {
  if (raw === undefined) return fallback;
  const n = typeof raw === "number" ? asNumber(raw) : null;
  if (n === null || n < 0 || (!allowZero && n === 0)) {
    const bound = allowZero ? "greater than or equal to 0" : "greater than 0";
    err(messages, "CC_STYLE_INVALID", `barStyle.${field} must be a finite number ${bound}`);
    return fallback;
  }
  return n;
}

export function resolveChartStyle(raw: BarStyleOptions | undefined, messages: ChartMessage[]): Readonly<ChartStyle> {
  const opts: BarStyleOptions = raw ?? {};
  return Object.freeze({
    barWidth: validateStyleNumber(opts.barWidth, "barWidth", DEFAULT_CHART_STYLE.barWidth, false, messages),
    clusterGap: validateStyleNumber(opts.clusterGap, "clusterGap", DEFAULT_CHART_STYLE.clusterGap, true, messages),
    inset: validateStyleNumber(opts.inset, "inset", DEFAULT_CHART_STYLE.inset, true, messages),
    whiskerSize: validateStyleNumber(opts.whiskerSize, "whiskerSize", DEFAULT_CHART_STYLE.whiskerSize, true, messages),
  });
}

export function resolveChartConfig(opts: ColumnChartOptions): { config: ResolvedChartConfig | null; messages: ChartMessage[] } {
  const messages: ChartMessage[] = [];

  const mode: unknown = opts.mode ?? DEFAULT_CHART_MODE;
  if (!isChartMode(mode)) err(messages, "CC_UNKNOWN_MODE", `Unknown chart mode: ${String(mode)}`);

  const labelKey: unknown = opts.labelKey;
  if (!isSingleKey(labelKey)) {
    err(messages, "CC_LABEL_KEY", "labelKey must be a single property name or non-negative integer index");
  } else if (typeof labelKey === "string" && bannedKeys.has(labelKey)) {
    err(messages, "CC_DISALLOWED_KEY", `Disallowed labelKey: ${labelKey}`, { key: labelKey });
  }

  const valueKeys = validateKeys(opts.valueKeys, "valueKeys", messages);
  const errorKeys = validateKeys(opts.errorKeys, "errorKeys", messages);

  if (valueKeys && mode === "basic" && valueKeys.length !== 1) {
    err(messages, "CC_BASIC_SINGLE_VALUE_KEY", `basic mode takes exactly one value key, got ${valueKeys.length}`);
  }
  if (valueKeys && errorKeys && errorKeys.length > 0 && errorKeys.length !== valueKeys.length) {
    const list = errorKeys.map(keyText).join(", ");
    err(
      messages,
      "CC_ERROR_KEYS_CARDINALITY",
      `errorKeys (${list}) must match valueKeys one-to-one: expected ${valueKeys.length}, got ${errorKeys.length}`
    );
  }

  const style = resolveChartStyle(opts.barStyle, messages);

  if (!Array.isArray(opts.data)) {
    err(messages, "CC_DATA", "data must be an array of rows");
  }

  if (hasErrors(messages) || !isChartMode(mode) || !isSingleKey(labelKey) || !valueKeys || !errorKeys) {
    return { config: null, messages };
  }

  return {
    config: Object.freeze({ labelKey, valueKeys, errorKeys, mode, style }),
    messages,
  };
}

export function resolvePlotSize(raw: Partial<PlotSize> | undefined): PlotSize {
  const width = asNumber(raw?.width);
  const height = asNumber(raw?.height);
  return {
    width: width !== null && width > 0 ? width : DEFAULT_PLOT_SIZE.width,
    height: height !== null && height > 0 ? height : DEFAULT_PLOT_SIZE.height,
  };
}

export function resolveYFormat(mode: ChartMode, axis: AxisOptions | undefined): ValueFormat | undefined {
  if (axis?.yFormat !== undefined) return axis.yFormat;
  return mode === "stacked100" ? "percent" : undefined;
}

export function axisStyleFromOptions(axis: AxisOptions | undefined): AxisStyle {
  if (!axis) return {};
  return {
    ...(axis.title !== undefined ? { title: axis.title } : {}),
    ...(axis.subtitle !== undefined ? { subtitle: axis.subtitle } : {}),
    ...(axis.xLabel !== undefined ? { xLabel: axis.xLabel } : {}),
    ...(axis.yLabel !== undefined ? { yLabel: axis.yLabel } : {}),
    ...(axis.grid !== undefined ? { grid: axis.grid } : {}),
  };
}
