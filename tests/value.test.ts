import { describe, it, expect } from 'vitest';
import {
  ArrayValue,
  ObjectValue,
  arrayValue,
  boolValue,
  copyValue,
  floatValue,
  formatG,
  fromJS,
  intValue,
  isTruthy,
  nullValue,
  objectValue,
  releaseValue,
  stringValue,
  toJS,
  typeName,
  valueToString,
  valuesEqual
} from '../src/core/value.js';

describe('Value model', () => {
  describe('formatG', () => {
    it('renders six significant digits like %g', () => {
      expect(formatG(3.5)).toBe('3.5');
      expect(formatG(1 / 3)).toBe('0.333333');
      expect(formatG(100000)).toBe('100000');
      expect(formatG(0.0001)).toBe('0.0001');
    });

    it('switches to exponent notation outside [1e-4, 1e6)', () => {
      expect(formatG(1e6)).toBe('1e+06');
      expect(formatG(0.00001)).toBe('1e-05');
      expect(formatG(123456789)).toBe('1.23457e+08');
    });

    it('names the non-finite values', () => {
      expect(formatG(NaN)).toBe('nan');
      expect(formatG(Infinity)).toBe('inf');
      expect(formatG(-Infinity)).toBe('-inf');
    });
  });

  describe('valueToString', () => {
    it('stringifies every kind', () => {
      expect(valueToString(nullValue())).toBe('null');
      expect(valueToString(intValue(-42))).toBe('-42');
      expect(valueToString(floatValue(2.5))).toBe('2.5');
      expect(valueToString(boolValue(false))).toBe('false');
      expect(valueToString(stringValue('hi'))).toBe('hi');
      expect(valueToString(stringValue(null))).toBe('');
      expect(valueToString(arrayValue([intValue(1), intValue(2)]))).toBe('[array with 2 items]');
      expect(valueToString(objectValue([['a', intValue(1)]]))).toBe('[object with 1 entries]');
    });
  });

  describe('isTruthy', () => {
    it('treats zero, empty and absent values as falsy', () => {
      expect(isTruthy(nullValue())).toBe(false);
      expect(isTruthy(intValue(0))).toBe(false);
      expect(isTruthy(floatValue(0))).toBe(false);
      expect(isTruthy(stringValue(''))).toBe(false);
      expect(isTruthy(stringValue(null))).toBe(false);
      expect(isTruthy(arrayValue([]))).toBe(false);
      expect(isTruthy(arrayValue(null))).toBe(false);
      expect(isTruthy(objectValue([]))).toBe(false);
    });

    it('treats everything else as truthy', () => {
      expect(isTruthy(intValue(-1))).toBe(true);
      expect(isTruthy(floatValue(0.5))).toBe(true);
      expect(isTruthy(floatValue(NaN))).toBe(true);
      expect(isTruthy(boolValue(true))).toBe(true);
      expect(isTruthy(stringValue('0'))).toBe(true);
      expect(isTruthy(arrayValue([nullValue()]))).toBe(true);
      expect(isTruthy(objectValue([['k', nullValue()]]))).toBe(true);
    });
  });

  describe('valuesEqual', () => {
    it('requires matching tags', () => {
      expect(valuesEqual(intValue(1), floatValue(1))).toBe(false);
      expect(valuesEqual(stringValue('1'), intValue(1))).toBe(false);
      expect(valuesEqual(nullValue(), nullValue())).toBe(true);
    });

    it('compares containers structurally', () => {
      const a = fromJS({ list: [1, 'x'], flag: true });
      const b = fromJS({ flag: true, list: [1, 'x'] });
      const c = fromJS({ flag: true, list: [1, 'y'] });
      expect(valuesEqual(a, b)).toBe(true);
      expect(valuesEqual(a, c)).toBe(false);
    });
  });

  describe('ints', () => {
    it('wrap to signed 64 bits', () => {
      expect(intValue(2n ** 63n)).toEqual({ type: 'int', value: -(2n ** 63n) });
      expect(intValue(-(2n ** 63n) - 1n)).toEqual({ type: 'int', value: 2n ** 63n - 1n });
    });

    it('truncate fractional numbers', () => {
      expect(intValue(3.9)).toEqual({ type: 'int', value: 3n });
    });
  });

  describe('ownership', () => {
    it('copies containers deeply', () => {
      const original = fromJS([[1, 2]]);
      const copy = copyValue(original);
      if (copy.type !== 'array' || !copy.value) throw new Error('expected array');
      const inner = copy.value.items()[0];
      if (inner.type !== 'array' || !inner.value) throw new Error('expected inner array');
      inner.value.push(intValue(3));

      expect(toJS(original)).toEqual([[1, 2]]);
      expect(toJS(copy)).toEqual([[1, 2, 3]]);
    });

    it('returns copies from container getters', () => {
      const arr = new ArrayValue([fromJS({ n: 1 })]);
      const first = arr.get(0);
      if (first.type !== 'object' || !first.value) throw new Error('expected object');
      first.value.set('n', intValue(2));
      expect(toJS(arrayValue(arr))).toEqual([{ n: 1 }]);
    });

    it('releases once; a second release is a no-op', () => {
      const v = fromJS([1, [2, 3]]);
      releaseValue(v);
      releaseValue(v);
      expect(v.type === 'array' && v.value ? v.value.length : -1).toBe(0);
    });

    it('keeps insertion order when a key is overwritten', () => {
      const obj = new ObjectValue();
      obj.set('a', intValue(1));
      obj.set('b', intValue(2));
      obj.set('a', intValue(3));
      expect(obj.keys()).toEqual(['a', 'b']);
      expect(obj.get('a')).toEqual({ type: 'int', value: 3n });
    });

    it('reports missing keys and out-of-range indexes as null', () => {
      const obj = new ObjectValue();
      expect(obj.get('nope')).toEqual(nullValue());
      expect(obj.delete('nope')).toBe(false);
      const arr = new ArrayValue([intValue(1)]);
      expect(arr.get(1)).toEqual(nullValue());
      expect(arr.get(-1)).toEqual(nullValue());
      expect(arr.set(5, intValue(2))).toBe(false);
      expect(new ArrayValue().pop()).toEqual(nullValue());
    });
  });

  describe('host conversion', () => {
    it('maps JS data onto values and back', () => {
      const data = { name: 'Ann', age: 31, score: 2.5, tags: ['a', 'b'], admin: false, manager: null };
      const v = fromJS(data);
      expect(typeName(v)).toBe('object');
      expect(toJS(v)).toEqual(data);
    });

    it('turns safe integers into ints and other numbers into floats', () => {
      expect(fromJS(7)).toEqual({ type: 'int', value: 7n });
      expect(fromJS(7.5)).toEqual({ type: 'float', value: 7.5 });
      expect(fromJS(10n)).toEqual({ type: 'int', value: 10n });
    });

    it('breaks cycles and drops functions', () => {
      const node: Record<string, unknown> = { id: 1 };
      node.self = node;
      node.fn = () => 1;
      expect(toJS(fromJS(node))).toEqual({ id: 1, self: null, fn: null });
    });

    it('keeps ints beyond the safe range as bigint', () => {
      expect(toJS(intValue(2n ** 60n))).toBe(2n ** 60n);
    });
  });
});
