/**
 * Purpose: Normalize heterogeneous input rows into uniform label/values/errors records.
 * Intent: Report every unresolvable key with its row, never drop a row silently.
 */

import { asNumber, err, keyText } from "./chart_common.js";
import { compileAccessor, compileAccessors, type Accessor } from "./selectors.js";
import type { ChartMessage, KeySequence, NormalizedRow, Row, SingleKey } from "./types.js";

type Flattened = { ok: true; values: number[] } | { ok: false; reason: string };

function flattenNumbers(raw: unknown): Flattened {
  if (Array.isArray(raw)) {
    const values: number[] = [];
    for (const item of raw) {
      const n = asNumber(item);
      if (n === null) return { ok: false, reason: "contains a non-numeric item" };
      values.push(n);
    }
    return { ok: true, values };
  }
  const n = asNumber(raw);
  if (n === null) return { ok: false, reason: "is not numeric" };
  return { ok: true, values: [n] };
}

// `widths[i]` is how many values key i flattened to, or null when it did not resolve.
function readValues(
  row: Row,
  index: number,
  accessors: Accessor[],
  messages: ChartMessage[]
): { values: number[] | null; widths: (number | null)[] } {
  const out: number[] = [];
  const widths: (number | null)[] = [];
  let ok = true;
  for (const acc of accessors) {
    const raw = acc.read(row);
    if (raw === undefined) {
      err(messages, "CC_MISSING_KEY", `Row ${index} is missing value key ${keyText(acc.key)}`, {
        rowIndex: index,
        key: acc.key,
      });
      widths.push(null);
      ok = false;
      continue;
    }
    const flat = flattenNumbers(raw);
    if (!flat.ok) {
      err(messages, "CC_MISSING_KEY", `Row ${index} value key ${keyText(acc.key)} ${flat.reason}`, {
        rowIndex: index,
        key: acc.key,
      });
      widths.push(null);
      ok = false;
      continue;
    }
    widths.push(flat.values.length);
    out.push(...flat.values);
  }
  return { values: ok ? out : null, widths };
}

// Error key i fills exactly the slots of value key i: absent keys give zeros, short ones are zero-padded.
// A present but unreadable error is still a fault.
function readErrors(
  row: Row,
  index: number,
  accessors: Accessor[],
  widths: readonly (number | null)[],
  messages: ChartMessage[]
): number[] | null {
  const out: number[] = [];
  let ok = true;
  for (let i = 0; i < accessors.length; i++) {
    const acc = accessors[i];
    if (!acc) continue;
    const width = widths[i] ?? null;
    const raw = acc.read(row);
    if (raw === undefined) {
      for (let k = 0; k < (width ?? 0); k++) out.push(0);
      continue;
    }
    const flat = flattenNumbers(raw);
    if (!flat.ok) {
      err(messages, "CC_MISSING_KEY", `Row ${index} error key ${keyText(acc.key)} ${flat.reason}`, {
        rowIndex: index,
        key: acc.key,
      });
      ok = false;
      continue;
    }
    if (width === null) {
      out.push(...flat.values);
      continue;
    }
    if (flat.values.length > width) {
      err(
        messages,
        "CC_ERROR_COUNT_MISMATCH",
        `Row ${index} error key ${keyText(acc.key)} has ${flat.values.length} errors for ${width} values`,
        { rowIndex: index, key: acc.key }
      );
      ok = false;
      continue;
    }
    out.push(...flat.values);
    for (let k = flat.values.length; k < width; k++) out.push(0);
  }
  return ok ? out : null;
}

export function normalizeRows(
  rows: readonly Row[],
  labelKey: SingleKey,
  valueKeys: KeySequence,
  errorKeys: KeySequence
): { rows: NormalizedRow[]; messages: ChartMessage[] } {
  const messages: ChartMessage[] = [];
  const out: NormalizedRow[] = [];

  const labelAccessor = compileAccessor(labelKey);
  const valueAccessors = compileAccessors(valueKeys);
  const errorAccessors = compileAccessors(errorKeys);

  let seriesCount: number | null = null;

  for (let index = 0; index < rows.length; index++) {
    const row = rows[index];
    if (row === undefined || row === null || typeof row !== "object") {
      err(messages, "CC_MISSING_KEY", `Row ${index} is not an object or array`, { rowIndex: index });
      continue;
    }

    const label = labelAccessor.read(row);
    if (label === undefined) {
      err(messages, "CC_MISSING_KEY", `Row ${index} is missing label key ${keyText(labelKey)}`, {
        rowIndex: index,
        key: labelKey,
      });
    }

    const { values, widths } = readValues(row, index, valueAccessors, messages);
    const errors = readErrors(row, index, errorAccessors, widths, messages);
    if (label === undefined || values === null || errors === null) continue;

    if (seriesCount === null) seriesCount = values.length;
    if (values.length !== seriesCount) {
      err(
        messages,
        "CC_SERIES_COUNT_MISMATCH",
        `Row ${index} has ${values.length} values; expected ${seriesCount} like the rows before it`,
        { rowIndex: index }
      );
      continue;
    }
    if (errors.length > values.length) {
      err(messages, "CC_ERROR_COUNT_MISMATCH", `Row ${index} has ${errors.length} errors for ${values.length} values`, {
        rowIndex: index,
      });
      continue;
    }
    while (errors.length < values.length) errors.push(0);

    out.push(Object.freeze({ index, label, values: Object.freeze(values), errors: Object.freeze(errors) }));
  }

  return { rows: out, messages };
}
