/**
 * Purpose: Turn key selectors into row accessors.
 * Intent: Resolve named vs positional lookup once per chart build, not per bar.
 */

import type { KeySequence, Row, Selector, SingleKey } from "./types.js";

export interface Accessor {
  key: SingleKey;
  /** Returns `undefined` when the key does not resolve on the row. */
  read(row: Row): unknown;
}

export function isSingleKey(sel: unknown): sel is SingleKey {
  return typeof sel === "string" || (typeof sel === "number" && Number.isInteger(sel) && sel >= 0);
}

export function toKeySequence(sel: Selector): KeySequence {
  if (isSingleKey(sel)) return Object.freeze([sel]);
  return Object.freeze([...sel]);
}

function ownValue(obj: object, prop: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(obj, prop)) return undefined;
  const v: unknown = Reflect.get(obj, prop);
  return v === null ? undefined : v;
}

export function compileAccessor(key: SingleKey): Accessor {
  if (typeof key === "number") {
    return {
      key,
      read(row) {
        if (Array.isArray(row)) {
          const v: unknown = row[key];
          return v === null ? undefined : v;
        }
        return ownValue(row, String(key));
      },
    };
  }
  return {
    key,
    read(row) {
      if (Array.isArray(row)) return undefined;
      return ownValue(row, key);
    },
  };
}

export function compileAccessors(keys: KeySequence): Accessor[] {
  return keys.map((k) => compileAccessor(k));
}
