/**
 * Purpose: Provide shared utilities for column-chart validation diagnostics.
 * Intent: Centralize key safety checks, labels, and normalized message helpers.
 */

import type { ChartMessage, ChartMessageCode, SingleKey } from "./types.js";

export const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);

export function err(
  messages: ChartMessage[],
  code: ChartMessageCode,
  message: string,
  extra?: Omit<ChartMessage, "severity" | "code" | "message">
): void {
  messages.push({ severity: "error", code, message, ...(extra ?? {}) });
}

export function warn(
  messages: ChartMessage[],
  code: ChartMessageCode,
  message: string,
  extra?: Omit<ChartMessage, "severity" | "code" | "message">
): void {
  messages.push({ severity: "warning", code, message, ...(extra ?? {}) });
}

export function hasErrors(messages: readonly ChartMessage[]): boolean {
  return messages.some((m) => m.severity === "error");
}

export function asNumber(v: unknown): number | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim()) {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function keyText(key: SingleKey): string {
  return typeof key === "number" ? `[${key}]` : `'${key}'`;
}

const labelAbbreviations = new Map<string, string>([
  ["id", "ID"],
  ["pk", "PK"],
  ["url", "URL"],
  ["api", "API"],
  ["ui", "UI"],
  ["csv", "CSV"],
  ["json", "JSON"],
  ["kpi", "KPI"],
  ["yoy", "YoY"],
]);

export function defaultLabelForKey(key: SingleKey): string {
  if (typeof key === "number") return `Series ${key + 1}`;
  const raw = key.trim();
  if (!raw) return key;
  if (!raw.includes("_") && !raw.includes("-")) return key;

  const parts = raw.split(/[_-]+/).filter(Boolean);
  if (parts.length === 0) return key;

  const words = parts.map((part) => {
    const lower = part.toLowerCase();
    const abbr = labelAbbreviations.get(lower);
    if (abbr) return abbr;
    const first = part[0];
    if (!first) return part;
    return first.toUpperCase() + part.slice(1);
  });

  return words.join(" ");
}
