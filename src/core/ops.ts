/**
 * exprvm Core - Operators
 *
 * Permissive operator, property and method semantics. The VM and the
 * constant folder both evaluate through these tables, so a folded literal
 * always matches what the unfolded bytecode would produce.
 *
 * Mismatched operand types yield null rather than throwing. Ints promote
 * to floats when mixed with a float.
 */

import type { BinaryOperator, UnaryOperator } from './ast.js';
import {
  arrayValue,
  boolValue,
  floatValue,
  intValue,
  isTruthy,
  nullValue,
  releaseValue,
  stringValue,
  typeName,
  valueToString,
  valuesEqual,
  type Value
} from './value.js';

export type BinaryOp = (left: Value, right: Value) => Value;
export type UnaryOp = (operand: Value) => Value;

const isNumeric = (v: Value): v is Extract<Value, { type: 'int' | 'float' }> =>
  v.type === 'int' || v.type === 'float';

const toNumber = (v: Extract<Value, { type: 'int' | 'float' }>): number =>
  v.type === 'int' ? Number(v.value) : v.value;

/**
 * Shared arithmetic shape: int x int stays integral (wrapped to 64 bits),
 * any float operand promotes both sides. A `null` from either kernel means
 * the result is undefined (division by zero).
 */
function arithmetic(
  intOp: (a: bigint, b: bigint) => bigint | null,
  floatOp: (a: number, b: number) => number | null
): BinaryOp {
  return (left, right) => {
    if (left.type === 'int' && right.type === 'int') {
      const r = intOp(left.value, right.value);
      return r === null ? nullValue() : intValue(r);
    }
    if (isNumeric(left) && isNumeric(right)) {
      const r = floatOp(toNumber(left), toNumber(right));
      return r === null ? nullValue() : floatValue(r);
    }
    return nullValue();
  };
}

const sub = arithmetic((a, b) => a - b, (a, b) => a - b);
const mul = arithmetic((a, b) => a * b, (a, b) => a * b);
// bigint division truncates toward zero and % keeps the dividend's sign.
const div = arithmetic((a, b) => (b === 0n ? null : a / b), (a, b) => (b === 0 ? null : a / b));
const mod = arithmetic((a, b) => (b === 0n ? null : a % b), (a, b) => (b === 0 ? null : a % b));
const numericAdd = arithmetic((a, b) => a + b, (a, b) => a + b);

const concat: BinaryOp = (left, right) => stringValue(valueToString(left) + valueToString(right));

const add: BinaryOp = (left, right) =>
  left.type === 'string' || right.type === 'string' ? concat(left, right) : numericAdd(left, right);

/**
 * -1, 0 or 1 for ordered pairs; undefined when the pair has no order
 * (mixed kinds, NaN, absent strings).
 */
function compare(left: Value, right: Value): number | undefined {
  if (left.type === 'int' && right.type === 'int') {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  if (isNumeric(left) && isNumeric(right)) {
    const a = toNumber(left);
    const b = toNumber(right);
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (left.type === 'string' && right.type === 'string' && left.value !== null && right.value !== null) {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  return undefined;
}

function relational(test: (order: number) => boolean): BinaryOp {
  return (left, right) => {
    const order = compare(left, right);
    return boolValue(order !== undefined && test(order));
  };
}

const binaryOps: Record<BinaryOperator, BinaryOp> = {
  '+': add,
  '-': sub,
  '*': mul,
  '/': div,
  '%': mod,
  '..': concat,
  '==': (l, r) => boolValue(valuesEqual(l, r)),
  '!=': (l, r) => boolValue(!valuesEqual(l, r)),
  '<': relational((o) => o < 0),
  '<=': relational((o) => o <= 0),
  '>': relational((o) => o > 0),
  '>=': relational((o) => o >= 0),
  '&&': (l, r) => boolValue(isTruthy(l) && isTruthy(r)),
  '||': (l, r) => boolValue(isTruthy(l) || isTruthy(r)),
};

export const BINARY_OPS: Readonly<Record<BinaryOperator, BinaryOp>> = Object.freeze(binaryOps);

const unaryOps: Record<UnaryOperator, UnaryOp> = {
  '-': (v: Value) => {
    if (v.type === 'int') return intValue(-v.value);
    if (v.type === 'float') return floatValue(-v.value);
    return nullValue();
  },
  '!': (v: Value) => boolValue(!isTruthy(v)),
  typeof: (v: Value) => stringValue(typeName(v)),
};

export const UNARY_OPS: Readonly<Record<UnaryOperator, UnaryOp>> = Object.freeze(unaryOps);

// --- property access -------------------------------------------------------

/** `object.name`. Borrows `target`; the result is an owned copy. */
export function getProperty(target: Value, name: string): Value {
  switch (target.type) {
    case 'object':
      return target.value ? target.value.get(name) : nullValue();
    case 'array':
      return name === 'length' && target.value ? intValue(target.value.length) : nullValue();
    case 'string':
      return name === 'length' && target.value !== null ? intValue(target.value.length) : nullValue();
    default:
      return nullValue();
  }
}

function indexOf(key: Value, length: number): number | undefined {
  if (key.type !== 'int' || key.value < 0n || key.value >= BigInt(length)) return undefined;
  return Number(key.value);
}

/**
 * `target[key]` for arrays, strings and objects. Borrows both operands.
 * String positions (here, in `length` and in `substring`) count UTF-16 code
 * units, not UTF-8 bytes; the two agree only for ASCII text.
 */
export function getComputed(target: Value, key: Value): Value {
  switch (target.type) {
    case 'array': {
      if (!target.value) return nullValue();
      const i = indexOf(key, target.value.length);
      return i === undefined ? nullValue() : target.value.get(i);
    }
    case 'string': {
      if (target.value === null) return nullValue();
      const i = indexOf(key, target.value.length);
      return i === undefined ? nullValue() : stringValue(target.value[i]);
    }
    case 'object':
      return target.value && key.type === 'string' && key.value !== null ? target.value.get(key.value) : nullValue();
    default:
      return nullValue();
  }
}

// --- methods ---------------------------------------------------------------

/** Both receiver and args are owned by the method; the result is owned by the caller. */
type Method<R extends Value> = (receiver: R, args: Value[]) => Value;

type ArrayReceiver = Extract<Value, { type: 'array' }>;

const ARRAY_METHODS: Readonly<Record<string, Method<ArrayReceiver>>> = {
  push(receiver, args) {
    const arr = receiver.value;
    if (!arr) return nullValue();
    for (const arg of args.splice(0)) arr.push(arg);
    return intValue(arr.length);
  },
  pop(receiver) {
    return receiver.value ? receiver.value.pop() : nullValue();
  },
  length(receiver) {
    return receiver.value ? intValue(receiver.value.length) : nullValue();
  },
  reverse(receiver) {
    if (!receiver.value) return nullValue();
    // In place; the receiver's container moves into the result.
    return arrayValue(receiver.value.reverse());
  },
};

const isTrimmable = (ch: string): boolean => ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';

function trim(s: string): string {
  let start = 0;
  let end = s.length;
  while (start < end && isTrimmable(s[start])) start++;
  while (end > start && isTrimmable(s[end - 1])) end--;
  return s.slice(start, end);
}

function clampIndex(v: Value | undefined, fallback: number, length: number): number {
  if (!v || v.type !== 'int') return fallback;
  if (v.value < 0n) return 0;
  return v.value > BigInt(length) ? length : Number(v.value);
}

const STRING_METHODS: Readonly<Record<string, (s: string, args: readonly Value[]) => Value>> = {
  length: (s) => intValue(s.length),
  toUpperCase: (s) => stringValue(s.toUpperCase()),
  toLowerCase: (s) => stringValue(s.toLowerCase()),
  trim: (s) => stringValue(trim(s)),
  substring(s, args) {
    if (args.length < 1) return nullValue();
    const start = clampIndex(args[0], 0, s.length);
    const end = clampIndex(args[1], s.length, s.length);
    return stringValue(end < start ? '' : s.slice(start, end));
  },
};

/**
 * Dispatch `receiver.method(...args)`. Takes ownership of the receiver and
 * the args; anything not moved into the result is released.
 */
export function callMethod(receiver: Value, name: string, args: Value[]): Value {
  let result: Value = nullValue();
  if (receiver.type === 'array' && Object.hasOwn(ARRAY_METHODS, name)) {
    result = ARRAY_METHODS[name](receiver, args);
  } else if (receiver.type === 'string' && receiver.value !== null && Object.hasOwn(STRING_METHODS, name)) {
    result = STRING_METHODS[name](receiver.value, args);
  }
  if (!(result.type === 'array' && receiver.type === 'array' && result.value === receiver.value)) {
    releaseValue(receiver);
  }
  for (const arg of args) releaseValue(arg);
  return result;
}
