/**
 * Purpose: Declare shared column-chart engine TypeScript types.
 * Intent: Keep cross-module contracts explicit and stable.
 */

export type Row = Readonly<Record<string, unknown>> | readonly unknown[];

/** Named property (string) or positional index (number). */
export type SingleKey = string | number;

export type KeySequence = readonly SingleKey[];

export type Selector = SingleKey | KeySequence;

export type ChartMode = "basic" | "clustered" | "stacked" | "stacked100";

export const CHART_MODES: readonly ChartMode[] = Object.freeze(["basic", "clustered", "stacked", "stacked100"]);

export type ChartSeverity = "error" | "warning";

export type ChartMessageCode =
  | "CC_MISSING_KEY"
  | "CC_SERIES_COUNT_MISMATCH"
  | "CC_ERROR_COUNT_MISMATCH"
  | "CC_UNKNOWN_MODE"
  | "CC_BASIC_SINGLE_VALUE_KEY"
  | "CC_LABEL_KEY"
  | "CC_VALUE_KEYS"
  | "CC_ERROR_KEYS"
  | "CC_DATA"
  | "CC_ERROR_KEYS_CARDINALITY"
  | "CC_DISALLOWED_KEY"
  | "CC_STYLE_INVALID"
  | "CC_WHISKERS_IGNORED";

export interface ChartMessage {
  severity: ChartSeverity;
  code: ChartMessageCode;
  message: string;
  rowIndex?: number;
  key?: SingleKey;
}

export interface NormalizedRow {
  readonly index: number;
  readonly label: unknown;
  readonly values: readonly number[];
  readonly errors: readonly number[];
}

export interface BarGeometry {
  rowIndex: number;
  seriesIndex: number;
  xCenter: number;
  xHalfWidth: number;
  yBase: number;
  yExtent: number;
}

export interface WhiskerGeometry {
  rowIndex: number;
  seriesIndex: number;
  yLow: number;
  yHigh: number;
  capHalfWidth: number;
}

export interface XRange {
  min: number;
  max: number;
}

export interface XTick {
  index: number;
  label: unknown;
}

export interface ColumnChartGeometry {
  mode: ChartMode;
  seriesCount: number;
  rows: readonly NormalizedRow[];
  bars: readonly BarGeometry[];
  whiskers: readonly WhiskerGeometry[];
  xRange: XRange;
  xTicks: readonly XTick[];
  messages: ChartMessage[];
}
