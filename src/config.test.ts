import { describe, expect, it } from "vitest";
import {
  DEFAULT_CHART_STYLE,
  axisStyleFromOptions,
  resolveChartConfig,
  resolvePlotSize,
  resolveYFormat,
} from "./config.js";

describe("resolveChartConfig", () => {
  it("fills defaults and normalizes selectors to sequences", () => {
    const { config, messages } = resolveChartConfig({ data: [], labelKey: "k", valueKeys: "v" });
    expect(messages).toEqual([]);
    expect(config).toEqual({
      labelKey: "k",
      valueKeys: ["v"],
      errorKeys: [],
      mode: "basic",
      style: { barWidth: 0.8, clusterGap: 0, inset: 1, whiskerSize: 0.25 },
    });
    expect(Object.isFrozen(DEFAULT_CHART_STYLE)).toBe(true);
  });

  it("keeps caller style values that pass validation", () => {
    const { config } = resolveChartConfig({
      data: [],
      labelKey: 0,
      valueKeys: [1, 2],
      mode: "clustered",
      barStyle: { barWidth: 0.6, clusterGap: 0.02, inset: 0.5, whiskerSize: 0 },
    });
    expect(config?.style).toEqual({ barWidth: 0.6, clusterGap: 0.02, inset: 0.5, whiskerSize: 0 });
  });

  it("collects every problem before giving up", () => {
    const { config, messages } = resolveChartConfig({
      data: [],
      labelKey: "constructor",
      valueKeys: [],
      barStyle: { clusterGap: -1, whiskerSize: Number.NaN },
    });
    expect(config).toBeNull();
    expect(messages.map((m) => m.code)).toEqual([
      "CC_DISALLOWED_KEY",
      "CC_VALUE_KEYS",
      "CC_STYLE_INVALID",
      "CC_STYLE_INVALID",
    ]);
  });

  it("rejects fractional and negative indexes", () => {
    const { messages } = resolveChartConfig({ data: [], labelKey: "k", valueKeys: [1.5] });
    expect(messages).toEqual([
      {
        severity: "error",
        code: "CC_VALUE_KEYS",
        message: "valueKeys entries must be property names or non-negative integer indexes",
      },
    ]);
  });
});

describe("plot request helpers", () => {
  it("replaces missing or non-positive sizes with defaults", () => {
    expect(resolvePlotSize(undefined)).toEqual({ width: 720, height: 260 });
    expect(resolvePlotSize({ width: 400, height: -1 })).toEqual({ width: 400, height: 260 });
  });

  it("uses a percent axis for stacked100 unless told otherwise", () => {
    expect(resolveYFormat("stacked100", undefined)).toBe("percent");
    expect(resolveYFormat("stacked100", { yFormat: { kind: "number", digits: 1 } })).toEqual({ kind: "number", digits: 1 });
    expect(resolveYFormat("basic", undefined)).toBeUndefined();
  });

  it("copies only the axis fields that were given", () => {
    expect(axisStyleFromOptions({ xLabel: "Region", yFormat: "integer" })).toEqual({ xLabel: "Region" });
    expect(axisStyleFromOptions(undefined)).toEqual({});
  });
});
