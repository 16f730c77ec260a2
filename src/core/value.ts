/**
 * exprvm Core - Value Model
 *
 * Tagged dynamic value consumed and produced by the expression VM.
 *
 * Containers (ArrayValue, ObjectValue) are owned by exactly one Value.
 * Reading through a container returns a deep copy; storing into a container
 * transfers ownership of the stored Value. Nothing is ever aliased.
 */

export type ValueType = 'null' | 'int' | 'float' | 'bool' | 'string' | 'array' | 'object';

export interface NullValue { readonly type: 'null' }
export interface IntValue { readonly type: 'int'; readonly value: bigint }
export interface FloatValue { readonly type: 'float'; readonly value: number }
export interface BoolValue { readonly type: 'bool'; readonly value: boolean }
/** `value === null` models a string without backing data. */
export interface StringValue { readonly type: 'string'; readonly value: string | null }
export interface ArrayRef { readonly type: 'array'; readonly value: ArrayValue | null }
export interface ObjectRef { readonly type: 'object'; readonly value: ObjectValue | null }

export type Value =
  | NullValue
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | ArrayRef
  | ObjectRef;

export interface ObjectEntry {
  readonly key: string;
  value: Value;
}

const NULL: NullValue = Object.freeze({ type: 'null' });

/** Wrap to a signed 64-bit integer. */
export const toInt64 = (n: bigint): bigint => BigInt.asIntN(64, n);

export const nullValue = (): Value => NULL;

export function intValue(value: bigint | number): Value {
  const n = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
  return { type: 'int', value: toInt64(n) };
}

export const floatValue = (value: number): Value => ({ type: 'float', value });
export const boolValue = (value: boolean): Value => ({ type: 'bool', value });
export const stringValue = (value: string | null): Value => ({ type: 'string', value });

/**
 * Wrap an array. Ownership of `items` (and every Value inside it) moves
 * into the new ArrayValue.
 */
export function arrayValue(items: Value[] | ArrayValue | null = []): Value {
  if (items === null || items instanceof ArrayValue) return { type: 'array', value: items };
  return { type: 'array', value: new ArrayValue(items) };
}

export function objectValue(entries: Iterable<[string, Value]> | ObjectValue | null = []): Value {
  if (entries === null || entries instanceof ObjectValue) return { type: 'object', value: entries };
  const obj = new ObjectValue();
  for (const [key, value] of entries) obj.set(key, value);
  return { type: 'object', value: obj };
}

/**
 * Growable list of owned Values.
 */
export class ArrayValue {
  private _items: Value[];
  private _released = false;

  constructor(items: Value[] = []) {
    this._items = items;
  }

  get length(): number {
    return this._items.length;
  }

  /** Copy of the item at `index`, or null when out of range. */
  get(index: number): Value {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) return NULL;
    return copyValue(this._items[index]);
  }

  /** Borrowed view of the items; callers must not keep or mutate them. */
  items(): readonly Value[] {
    return this._items;
  }

  set(index: number, value: Value): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) {
      releaseValue(value);
      return false;
    }
    releaseValue(this._items[index]);
    this._items[index] = value;
    return true;
  }

  push(value: Value): number {
    this._items.push(value);
    return this._items.length;
  }

  /** Moves the last item out, or returns null when empty. */
  pop(): Value {
    return this._items.pop() ?? NULL;
  }

  reverse(): this {
    this._items.reverse();
    return this;
  }

  clone(): ArrayValue {
    return new ArrayValue(this._items.map(copyValue));
  }

  release(): void {
    if (this._released) return;
    this._released = true;
    for (const item of this._items) releaseValue(item);
    this._items = [];
  }
}

/**
 * Ordered map with unique keys. Lookup is a linear scan: binding scopes are
 * small and insertion order is the enumeration order.
 */
export class ObjectValue {
  private _entries: ObjectEntry[] = [];
  private _released = false;

  get size(): number {
    return this._entries.length;
  }

  private indexOf(key: string): number {
    for (let i = 0; i < this._entries.length; i++) {
      if (this._entries[i].key === key) return i;
    }
    return -1;
  }

  has(key: string): boolean {
    return this.indexOf(key) !== -1;
  }

  /** Copy of the value stored under `key`, or null. */
  get(key: string): Value {
    const i = this.indexOf(key);
    return i === -1 ? NULL : copyValue(this._entries[i].value);
  }

  /** Borrowed value under `key`; callers must copy before keeping it. */
  peek(key: string): Value | undefined {
    const i = this.indexOf(key);
    return i === -1 ? undefined : this._entries[i].value;
  }

  /** Stores `value` under `key`, taking ownership and releasing any previous value. */
  set(key: string, value: Value): void {
    const i = this.indexOf(key);
    if (i !== -1) {
      releaseValue(this._entries[i].value);
      this._entries[i].value = value;
      return;
    }
    this._entries.push({ key, value });
  }

  delete(key: string): boolean {
    const i = this.indexOf(key);
    if (i === -1) return false;
    releaseValue(this._entries[i].value);
    this._entries.splice(i, 1);
    return true;
  }

  keys(): string[] {
    return this._entries.map((e) => e.key);
  }

  entries(): readonly ObjectEntry[] {
    return this._entries;
  }

  clone(): ObjectValue {
    const out = new ObjectValue();
    for (const e of this._entries) out._entries.push({ key: e.key, value: copyValue(e.value) });
    return out;
  }

  release(): void {
    if (this._released) return;
    this._released = true;
    for (const e of this._entries) releaseValue(e.value);
    this._entries = [];
  }
}

export function copyValue(v: Value): Value {
  switch (v.type) {
    case 'array':
      return { type: 'array', value: v.value ? v.value.clone() : null };
    case 'object':
      return { type: 'object', value: v.value ? v.value.clone() : null };
    default:
      // Scalars and strings are immutable in JS; sharing them is a copy.
      return v;
  }
}

/** Release the containers owned by `v`. Releasing twice is a no-op. */
export function releaseValue(v: Value): void {
  if (v.type === 'array' || v.type === 'object') v.value?.release();
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'int':
      return b.type === 'int' && a.value === b.value;
    case 'float':
      return b.type === 'float' && a.value === b.value;
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'array': {
      if (b.type !== 'array') return false;
      if (!a.value || !b.value) return a.value === b.value;
      const x = a.value.items();
      const y = b.value.items();
      if (x.length !== y.length) return false;
      for (let i = 0; i < x.length; i++) {
        if (!valuesEqual(x[i], y[i])) return false;
      }
      return true;
    }
    case 'object': {
      if (b.type !== 'object') return false;
      if (!a.value || !b.value) return a.value === b.value;
      if (a.value.size !== b.value.size) return false;
      for (const e of a.value.entries()) {
        const other = b.value.peek(e.key);
        if (other === undefined || !valuesEqual(e.value, other)) return false;
      }
      return true;
    }
  }
}

/** Name reported by `typeof`. */
export const typeName = (v: Value): ValueType => v.type;

export function isTruthy(v: Value): boolean {
  switch (v.type) {
    case 'null':
      return false;
    case 'int':
      return v.value !== 0n;
    case 'float':
      return v.value !== 0;
    case 'bool':
      return v.value;
    case 'string':
      return v.value !== null && v.value.length > 0;
    case 'array':
      return v.value !== null && v.value.length > 0;
    case 'object':
      return v.value !== null && v.value.size > 0;
  }
}

const trimFraction = (s: string): string => (s.includes('.') ? s.replace(/\.?0+$/, '') : s);

/**
 * printf-style `%g` rendering: `precision` significant digits, exponent
 * notation outside [1e-4, 10^precision).
 */
export function formatG(x: number, precision = 6): string {
  if (Number.isNaN(x)) return 'nan';
  if (!Number.isFinite(x)) return x < 0 ? '-inf' : 'inf';
  if (x === 0) return Object.is(x, -0) ? '-0' : '0';

  const [mantissa, expText] = x.toExponential(precision - 1).split('e');
  const exp = Number(expText);
  if (exp < -4 || exp >= precision) {
    const abs = Math.abs(exp);
    return `${trimFraction(mantissa)}e${exp < 0 ? '-' : '+'}${abs < 10 ? '0' : ''}${abs}`;
  }
  return trimFraction(x.toFixed(precision - 1 - exp));
}

export function valueToString(v: Value): string {
  switch (v.type) {
    case 'null':
      return 'null';
    case 'int':
      return v.value.toString();
    case 'float':
      return formatG(v.value);
    case 'bool':
      return v.value ? 'true' : 'false';
    case 'string':
      return v.value ?? '';
    case 'array':
      return `[array with ${v.value ? v.value.length : 0} items]`;
    case 'object':
      return `[object with ${v.value ? v.value.size : 0} entries]`;
  }
}

/**
 * Convert a host (JS) value into an owned Value.
 * Safe integers become ints, other numbers floats; cycles and
 * non-data values (functions, symbols) become null.
 */
export function fromJS(input: unknown, seen: WeakSet<object> = new WeakSet()): Value {
  switch (typeof input) {
    case 'boolean':
      return boolValue(input);
    case 'bigint':
      return intValue(input);
    case 'number':
      return Number.isSafeInteger(input) ? intValue(input) : floatValue(input);
    case 'string':
      return stringValue(input);
    case 'object': {
      if (input === null || seen.has(input)) return NULL;
      seen.add(input);
      try {
        if (Array.isArray(input)) {
          return arrayValue(input.map((item: unknown) => fromJS(item, seen)));
        }
        const obj = new ObjectValue();
        for (const [key, item] of Object.entries(input)) obj.set(key, fromJS(item, seen));
        return objectValue(obj);
      } finally {
        seen.delete(input);
      }
    }
    default:
      return NULL;
  }
}

/** Convert a Value back into plain JS data (ints outside the safe range stay bigint). */
export function toJS(v: Value): unknown {
  switch (v.type) {
    case 'null':
      return null;
    case 'int': {
      const n = Number(v.value);
      return Number.isSafeInteger(n) ? n : v.value;
    }
    case 'float':
    case 'bool':
    case 'string':
      return v.value;
    case 'array':
      return v.value ? v.value.items().map(toJS) : null;
    case 'object':
      return v.value ? Object.fromEntries(v.value.entries().map((e) => [e.key, toJS(e.value)])) : null;
  }
}
