/**
 * Purpose: Define the contract between the geometry engine and a plotting backend.
 * Intent: The engine only feeds data-space geometry; drawing, axes, and styling live behind this seam.
 */

import type { BarGeometry, WhiskerGeometry, XRange, XTick } from "./types.js";

export type ValueFormat =
  | "number"
  | "integer"
  | "percent"
  | "percent01"
  | "currency"
  | "date"
  | {
      kind: "number" | "integer" | "percent" | "currency" | "date";
      digits?: number;
      currency?: string;
      scale?: number;
    };

export interface PlotSize {
  width: number;
  height: number;
}

export interface AxisStyle {
  title?: string;
  subtitle?: string;
  xLabel?: string;
  yLabel?: string;
  grid?: boolean;
}

/** Names of the two axes a series maps onto, horizontal first. */
export type AxisKeyPair = readonly [x: string, y: string];

export type SeriesStyle = string | ((index: number) => string);

export interface SeriesStyleHandle {
  seriesIndex: number;
  label: string;
  style: SeriesStyle;
}

export interface PlotRequest {
  size: PlotSize;
  axisStyle: AxisStyle;
  xRange: XRange;
  xTicks: readonly XTick[];
  yFormat: ValueFormat | undefined;
  style: readonly SeriesStyleHandle[];
}

export interface PlotSurface {
  bars(geometry: readonly BarGeometry[], axes: AxisKeyPair, style: SeriesStyle, label: string): void;
  whiskers(geometry: readonly WhiskerGeometry[], axes: AxisKeyPair, style: SeriesStyle, label: string): void;
}

export type DrawCallback = (surface: PlotSurface) => void;

export interface ChartPlotter<T> {
  plot(request: PlotRequest, draw: DrawCallback): T;
}
