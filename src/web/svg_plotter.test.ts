import { describe, expect, it } from "vitest";
import { renderColumnChart } from "../engine.js";
import { createSvgPlotter } from "./svg_plotter.js";

const letters = [
  { label: "A", value: 1 },
  { label: "B", value: 2 },
  { label: "C", value: 3 },
];

function texts(root: Element, selector: string): string[] {
  return Array.from(root.querySelectorAll(selector)).map((el) => el.textContent ?? "");
}

describe("createSvgPlotter", () => {
  it("maps bar geometry to pixel rectangles", () => {
    const view = renderColumnChart(
      { data: letters, labelKey: "label", valueKeys: "value", barStyle: { inset: 0 }, axis: { title: "Totals" } },
      createSvgPlotter()
    );

    expect(texts(view, ".view-title")).toEqual(["Totals"]);
    const rects = Array.from(view.querySelectorAll("rect.chart-bar"));
    expect(rects).toHaveLength(3);

    const first = rects[0];
    const last = rects[2];
    expect(first?.getAttribute("x")).toBe("54.00");
    expect(first?.getAttribute("width")).toBe("186.29");
    expect(first?.getAttribute("fill")).toBe("#4c6fff");
    expect(last?.getAttribute("y")).toBe("63.50");
    expect(last?.getAttribute("height")).toBe("154.50");
    expect(last?.getAttribute("data-row")).toBe("2");

    expect(texts(view, "text.chart-y-tick")).toEqual(["0", "1", "2", "3", "4"]);
    expect(texts(view, "text.chart-x-tick")).toEqual(["A", "B", "C"]);
    expect(view.querySelector(".chart-legend")).toBeNull();
    expect(view.querySelector(".chart-grid")).not.toBeNull();
  });

  it("draws non-degenerate whiskers and a legend for several series", () => {
    const opts = {
      data: [{ k: "x", a: 2, b: 3, ea: 0.5 }],
      labelKey: "k",
      valueKeys: ["a", "b"],
      errorKeys: ["ea", "eb"],
      mode: "clustered" as const,
      axis: { grid: false },
    };

    const view = renderColumnChart(opts, createSvgPlotter());
    const whiskers = Array.from(view.querySelectorAll("path.chart-whisker"));
    expect(whiskers).toHaveLength(1);
    expect(whiskers[0]?.getAttribute("data-series")).toBe("0");
    expect(texts(view, ".chart-legend-label")).toEqual(["a", "b"]);
    expect(view.querySelector(".chart-grid")).toBeNull();

    const all = renderColumnChart(opts, createSvgPlotter({ drawZeroWhiskers: true }));
    expect(all.querySelectorAll("path.chart-whisker")).toHaveLength(2);
  });

  it("colors each bar through a per-bar style function", () => {
    const view = renderColumnChart(
      {
        data: letters,
        labelKey: "label",
        valueKeys: "value",
        barStyle: { color: (rowIndex) => (rowIndex === 1 ? "#ef4444" : "#999999") },
      },
      createSvgPlotter()
    );
    const fills = Array.from(view.querySelectorAll("rect.chart-bar")).map((r) => r.getAttribute("fill"));
    expect(fills).toEqual(["#999999", "#ef4444", "#999999"]);
  });

  it("formats the y axis as percent for stacked100", () => {
    const view = renderColumnChart(
      { data: [{ k: "q", a: 1, b: 3 }], labelKey: "k", valueKeys: ["a", "b"], mode: "stacked100" },
      createSvgPlotter()
    );
    const ticks = texts(view, "text.chart-y-tick");
    expect(ticks.every((t) => t.endsWith("%"))).toBe(true);
    expect(view.querySelectorAll("rect.chart-bar")).toHaveLength(2);
  });

  it("collapses the plot area instead of drawing negative sizes when the card is smaller than its margins", () => {
    const view = renderColumnChart(
      { data: letters, labelKey: "label", valueKeys: "value", barStyle: { inset: 0 }, size: { width: 40, height: 30 } },
      createSvgPlotter()
    );
    const rects = Array.from(view.querySelectorAll("rect.chart-bar"));
    expect(rects).toHaveLength(3);
    expect(rects.map((r) => r.getAttribute("width"))).toEqual(["0.00", "0.00", "0.00"]);
    expect(rects.map((r) => r.getAttribute("height"))).toEqual(["0.00", "0.00", "0.00"]);
  });

  it("refuses layers on an unknown axis pair", () => {
    const plotter = createSvgPlotter();
    const request = {
      size: { width: 300, height: 200 },
      axisStyle: {},
      xRange: { min: -1, max: 1 },
      xTicks: [],
      yFormat: undefined,
      style: [],
    };
    expect(() => plotter.plot(request, (surface) => surface.bars([], ["y", "x"], "#000000", "s"))).toThrow(
      "svg plotter: unsupported axis pair y/x"
    );
  });
});
