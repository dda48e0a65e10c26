/**
 * Purpose: Define the faults raised when a chart cannot be computed.
 * Intent: Carry stable codes and the full diagnostic list alongside a readable message.
 */

import type { ChartMessage, ChartMessageCode, SingleKey } from "./types.js";

export type ColumnChartErrorKind = "MissingKey" | "InvalidConfiguration";

export class ColumnChartError extends Error {
  readonly kind: ColumnChartErrorKind;
  readonly code: ChartMessageCode;
  readonly rowIndex: number | undefined;
  readonly key: SingleKey | undefined;
  readonly messages: readonly ChartMessage[];

  constructor(kind: ColumnChartErrorKind, first: ChartMessage, messages: readonly ChartMessage[]) {
    super(first.message);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.code = first.code;
    this.rowIndex = first.rowIndex;
    this.key = first.key;
    this.messages = Object.freeze([...messages]);
  }
}

export class MissingKeyError extends ColumnChartError {
  constructor(first: ChartMessage, messages: readonly ChartMessage[]) {
    super("MissingKey", first, messages);
  }
}

export class InvalidConfigurationError extends ColumnChartError {
  constructor(first: ChartMessage, messages: readonly ChartMessage[]) {
    super("InvalidConfiguration", first, messages);
  }
}

/**
 * Missing keys win over configuration problems so a caller sees the row-level cause first.
 */
export function raiseFromMessages(messages: readonly ChartMessage[]): never {
  const errors = messages.filter((m) => m.severity === "error");
  const missing = errors.find((m) => m.code === "CC_MISSING_KEY");
  if (missing) throw new MissingKeyError(missing, messages);
  const first: ChartMessage = errors[0] ?? {
    severity: "error",
    code: "CC_DATA",
    message: "column chart: configuration did not resolve",
  };
  throw new InvalidConfigurationError(first, messages);
}

export function throwOnErrors(messages: readonly ChartMessage[]): void {
  if (messages.some((m) => m.severity === "error")) raiseFromMessages(messages);
}
