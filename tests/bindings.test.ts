import { describe, it, expect } from 'vitest';
import { coerce, toNumber, toStyle, toText, toVisibility } from '../src/core/bindings.js';
import {
  arrayValue,
  boolValue,
  floatValue,
  fromJS,
  intValue,
  nullValue,
  stringValue
} from '../src/core/value.js';

describe('Binding coercion', () => {
  it('renders null as empty text', () => {
    expect(toText(nullValue())).toBe('');
    expect(toText(intValue(3))).toBe('3');
    expect(toText(floatValue(0.5))).toBe('0.5');
    expect(toText(arrayValue([]))).toBe('[array with 0 items]');
  });

  it('shows truthy results', () => {
    expect(toVisibility(stringValue('x'))).toBe(true);
    expect(toVisibility(intValue(0))).toBe(false);
    expect(toVisibility(nullValue())).toBe(false);
  });

  it('reads numbers out of numeric results and numeric text', () => {
    expect(toNumber(intValue(7))).toBe(7);
    expect(toNumber(floatValue(2.5))).toBe(2.5);
    expect(toNumber(boolValue(true))).toBe(1);
    expect(toNumber(stringValue(' 12.5 '))).toBe(12.5);
  });

  it('falls back when there is no number', () => {
    expect(toNumber(stringValue('abc'))).toBe(0);
    expect(toNumber(stringValue('   '), -1)).toBe(-1);
    expect(toNumber(stringValue(null), 5)).toBe(5);
    expect(toNumber(nullValue(), 9)).toBe(9);
  });

  it('builds style maps from objects and skips null entries', () => {
    expect(toStyle(fromJS({ color: 'red', width: 10, hidden: null }))).toEqual({ color: 'red', width: '10' });
  });

  it('parses inline style text', () => {
    expect(toStyle(stringValue('color: red; width:10px;; bogus'))).toEqual({ color: 'red', width: '10px' });
    expect(toStyle(intValue(1))).toEqual({});
  });

  it('dispatches by kind', () => {
    expect(coerce('text', boolValue(false))).toBe('false');
    expect(coerce('visibility', arrayValue([intValue(1)]))).toBe(true);
    expect(coerce('number', nullValue())).toBe(0);
    expect(coerce('style', stringValue('a: b'))).toEqual({ a: 'b' });
  });
});
