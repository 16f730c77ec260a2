/**
 * exprvm Core - Binding Coercion
 *
 * A bound property consumes the evaluation result in its own shape: text
 * content wants a string, conditional display a boolean, numeric
 * attributes a number and style bindings a declaration map.
 */

import { isTruthy, valueToString, type Value } from './value.js';

export interface BindingTypes {
  text: string;
  visibility: boolean;
  number: number;
  style: Record<string, string>;
}

export type BindingKind = keyof BindingTypes;

/** null renders as empty text rather than the word "null". */
export function toText(v: Value): string {
  return v.type === 'null' ? '' : valueToString(v);
}

export function toVisibility(v: Value): boolean {
  return isTruthy(v);
}

/** Numeric view of a result; `fallback` when it has none. */
export function toNumber(v: Value, fallback = 0): number {
  switch (v.type) {
    case 'int':
      return Number(v.value);
    case 'float':
      return v.value;
    case 'bool':
      return v.value ? 1 : 0;
    case 'string': {
      const text = v.value?.trim() ?? '';
      const n = Number(text);
      return text !== '' && Number.isFinite(n) ? n : fallback;
    }
    default:
      return fallback;
  }
}

/**
 * Style declarations from an object result (`{color: "red"}`) or from
 * inline text (`"color: red; width: 10px"`). Null entries are skipped.
 */
export function toStyle(v: Value): Record<string, string> {
  const out: Record<string, string> = {};
  if (v.type === 'object' && v.value) {
    for (const e of v.value.entries()) {
      if (e.value.type !== 'null') out[e.key] = valueToString(e.value);
    }
  } else if (v.type === 'string' && v.value) {
    for (const decl of v.value.split(';')) {
      const colon = decl.indexOf(':');
      if (colon === -1) continue;
      const prop = decl.slice(0, colon).trim();
      if (prop) out[prop] = decl.slice(colon + 1).trim();
    }
  }
  return out;
}

const COERCIONS: { [K in BindingKind]: (v: Value) => BindingTypes[K] } = {
  text: toText,
  visibility: toVisibility,
  number: (v) => toNumber(v),
  style: toStyle,
};

/** Borrows `v`. */
export function coerce<K extends BindingKind>(kind: K, v: Value): BindingTypes[K] {
  return COERCIONS[kind](v);
}
